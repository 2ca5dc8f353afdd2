import { writeFile } from 'node:fs/promises';
import JSZip from 'jszip';

export type CellStyle = 'header' | 'valid' | 'invalid';

export type CellInput = string | number | { value: string | number; style: CellStyle };

// styles.xml 中 cellXfs 的索引
const STYLE_INDEX: Record<CellStyle, number> = {
  header: 1,
  valid: 2,
  invalid: 3,
};

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function encodeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    // XML 1.0 不允許的控制字元
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '');
}

/**
 * 0 起算的欄索引轉成欄位字母：0 → A、26 → AA
 */
export function columnIndexToLetter(index: number): string {
  let letters = '';
  let n = index + 1;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export class SheetDraft {
  readonly rows: CellInput[][] = [];
  private widths: number[] = [];
  private freezeHeader = false;
  private autoFilter = false;

  constructor(readonly name: string) {}

  appendRow(cells: CellInput[]): this {
    this.rows.push(cells);
    return this;
  }

  setColumnWidths(widths: number[]): this {
    this.widths = widths;
    return this;
  }

  /**
   * 凍結標題列並加上自動篩選
   */
  setHeaderFeatures(freeze: boolean, autoFilter: boolean): this {
    this.freezeHeader = freeze;
    this.autoFilter = autoFilter;
    return this;
  }

  toXml(): string {
    const columnCount = this.rows.reduce((max, row) => Math.max(max, row.length), 0);
    const parts: string[] = [
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
      '<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">',
    ];

    if (this.freezeHeader) {
      parts.push(
        '<sheetViews><sheetView workbookViewId="0">',
        '<pane ySplit="1" topLeftCell="A2" activePane="bottomLeft" state="frozen"/>',
        '</sheetView></sheetViews>',
      );
    }

    if (this.widths.length > 0) {
      parts.push('<cols>');
      this.widths.forEach((width, i) => {
        parts.push(`<col min="${i + 1}" max="${i + 1}" width="${width}" customWidth="1"/>`);
      });
      parts.push('</cols>');
    }

    parts.push('<sheetData>');
    this.rows.forEach((row, r) => {
      parts.push(`<row r="${r + 1}">`);
      row.forEach((cell, c) => {
        parts.push(renderCell(`${columnIndexToLetter(c)}${r + 1}`, cell));
      });
      parts.push('</row>');
    });
    parts.push('</sheetData>');

    if (this.autoFilter && columnCount > 0 && this.rows.length > 0) {
      parts.push(`<autoFilter ref="A1:${columnIndexToLetter(columnCount - 1)}${this.rows.length}"/>`);
    }

    parts.push('</worksheet>');
    return parts.join('');
  }
}

function renderCell(ref: string, cell: CellInput): string {
  const { value, style } = typeof cell === 'object' ? cell : { value: cell, style: undefined };
  const styleAttr = style ? ` s="${STYLE_INDEX[style]}"` : '';

  if (typeof value === 'number') {
    return `<c r="${ref}"${styleAttr}><v>${value}</v></c>`;
  }
  return `<c r="${ref}"${styleAttr} t="inlineStr"><is><t xml:space="preserve">${encodeXml(value)}</t></is></c>`;
}

const STYLES_XML = [
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
  '<styleSheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">',
  '<fonts count="4">',
  '<font><sz val="11"/><name val="Calibri"/></font>',
  '<font><b/><sz val="11"/><color rgb="FFFFFFFF"/><name val="Calibri"/></font>',
  '<font><sz val="11"/><color rgb="FF008000"/><name val="Calibri"/></font>',
  '<font><sz val="11"/><color rgb="FFFF0000"/><name val="Calibri"/></font>',
  '</fonts>',
  '<fills count="3">',
  '<fill><patternFill patternType="none"/></fill>',
  '<fill><patternFill patternType="gray125"/></fill>',
  '<fill><patternFill patternType="solid"><fgColor rgb="FF4472C4"/><bgColor indexed="64"/></patternFill></fill>',
  '</fills>',
  '<borders count="2">',
  '<border><left/><right/><top/><bottom/><diagonal/></border>',
  '<border><left style="thin"/><right style="thin"/><top style="thin"/><bottom style="thin"/><diagonal/></border>',
  '</borders>',
  '<cellStyleXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0"/></cellStyleXfs>',
  '<cellXfs count="4">',
  '<xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"/>',
  '<xf numFmtId="0" fontId="1" fillId="2" borderId="1" xfId="0" applyFont="1" applyFill="1" applyBorder="1"/>',
  '<xf numFmtId="0" fontId="2" fillId="0" borderId="0" xfId="0" applyFont="1"/>',
  '<xf numFmtId="0" fontId="3" fillId="0" borderId="0" xfId="0" applyFont="1"/>',
  '</cellXfs>',
  '</styleSheet>',
].join('');

/**
 * 以 jszip 組出最小可用的 .xlsx
 */
export class WorkbookWriter {
  private readonly sheets: SheetDraft[] = [];

  addSheet(name: string): SheetDraft {
    const sheet = new SheetDraft(name);
    this.sheets.push(sheet);
    return sheet;
  }

  async toBuffer(): Promise<Buffer> {
    const sheets = this.sheets.length > 0 ? this.sheets : [new SheetDraft('Sheet1')];
    const zip = new JSZip();

    zip.file(
      '[Content_Types].xml',
      [
        '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
        '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">',
        '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>',
        '<Default Extension="xml" ContentType="application/xml"/>',
        '<Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>',
        '<Override PartName="/xl/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml"/>',
        ...sheets.map(
          (_, i) =>
            `<Override PartName="/xl/worksheets/sheet${i + 1}.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>`,
        ),
        '</Types>',
      ].join(''),
    );

    zip.file(
      '_rels/.rels',
      [
        '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
        '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">',
        '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="xl/workbook.xml"/>',
        '</Relationships>',
      ].join(''),
    );

    zip.file(
      'xl/workbook.xml',
      [
        '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
        '<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">',
        '<sheets>',
        ...sheets.map((sheet, i) => `<sheet name="${encodeXml(sheet.name)}" sheetId="${i + 1}" r:id="rId${i + 1}"/>`),
        '</sheets>',
        '</workbook>',
      ].join(''),
    );

    zip.file(
      'xl/_rels/workbook.xml.rels',
      [
        '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
        '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">',
        ...sheets.map(
          (_, i) =>
            `<Relationship Id="rId${i + 1}" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet" Target="worksheets/sheet${i + 1}.xml"/>`,
        ),
        `<Relationship Id="rId${sheets.length + 1}" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles" Target="styles.xml"/>`,
        '</Relationships>',
      ].join(''),
    );

    zip.file('xl/styles.xml', STYLES_XML);
    sheets.forEach((sheet, i) => {
      zip.file(`xl/worksheets/sheet${i + 1}.xml`, sheet.toXml());
    });

    return zip.generateAsync({
      type: 'nodebuffer',
      mimeType: XLSX_MIME,
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }

  async save(filePath: string): Promise<void> {
    await writeFile(filePath, await this.toBuffer());
  }
}
