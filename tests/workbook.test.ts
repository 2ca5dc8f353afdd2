import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { ColumnNotFoundError, WorkbookError } from '../src/utils/errors';
import {
  SheetData,
  WorkbookReader,
  columnLetterToIndex,
  createFileTask,
  decodeXml,
  findRecommendedColumn,
  firstSheetColumns,
  formatNumber,
  inspectWorkbook,
  parseSheetRows,
  resolveTargetColumn,
  selectColumn,
} from '../src/utils/workbook';
import { WorkbookWriter, columnIndexToLetter, encodeXml } from '../src/utils/workbookWriter';

async function handBuiltWorkbook(): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    'xl/workbook.xml',
    '<workbook xmlns:r="r"><sheets>' +
      '<sheet name="记录 &amp; 备注" sheetId="1" r:id="rId1"/>' +
      '<sheet name="空表" sheetId="2" r:id="rId2"/>' +
      '</sheets></workbook>',
  );
  zip.file(
    'xl/_rels/workbook.xml.rels',
    '<Relationships>' +
      '<Relationship Id="rId1" Type="worksheet" Target="worksheets/sheet1.xml"/>' +
      '<Relationship Id="rId2" Type="worksheet" Target="/xl/worksheets/sheet2.xml"/>' +
      '</Relationships>',
  );
  zip.file(
    'xl/sharedStrings.xml',
    '<sst count="4">' +
      '<si><t>姓名</t></si>' +
      '<si><t>消息内容</t></si>' +
      '<si><r><t>电话</t></r><r><rPr><b/></rPr><t xml:space="preserve">138 1234 5678</t></r></si>' +
      '<si><t>张三</t><rPh sb="0" eb="2"><t>ZHANG</t></rPh></si>' +
      '</sst>',
  );
  zip.file(
    'xl/worksheets/sheet1.xml',
    '<worksheet><sheetData>' +
      '<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c><c r="C1" t="inlineStr"><is><t>金额</t></is></c></row>' +
      '<row r="2"><c r="A2" t="s"><v>3</v></c><c r="B2" t="s"><v>2</v></c><c r="C2"><v>42.0</v></c></row>' +
      '<row r="4"><c r="A4" t="b"><v>1</v></c><c r="C4"><v>3.25</v></c></row>' +
      '<row r="5"><c r="B5" t="str"><f>A1</f><v>a &lt;b&gt;</v></c><c r="C5" s="1"/></row>' +
      '</sheetData></worksheet>',
  );
  zip.file('xl/worksheets/sheet2.xml', '<worksheet><sheetData/></worksheet>');
  return zip.generateAsync({ type: 'nodebuffer' });
}

async function singleSheetWorkbook(sheetXml: string, sharedStringsXml?: string): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('xl/workbook.xml', '<workbook><sheets><sheet name="Sheet1" sheetId="1" r:id="rId1"/></sheets></workbook>');
  zip.file(
    'xl/_rels/workbook.xml.rels',
    '<Relationships><Relationship Id="rId1" Type="worksheet" Target="worksheets/sheet1.xml"/></Relationships>',
  );
  if (sharedStringsXml !== undefined) {
    zip.file('xl/sharedStrings.xml', sharedStringsXml);
  }
  zip.file('xl/worksheets/sheet1.xml', `<worksheet><sheetData>${sheetXml}</sheetData></worksheet>`);
  return zip.generateAsync({ type: 'nodebuffer' });
}

describe('WorkbookReader', () => {
  it('reads shared, rich, inline, numeric and boolean cells into a rectangular grid', async () => {
    const reader = await WorkbookReader.fromBuffer(await handBuiltWorkbook());

    expect(reader.sheetNames()).toEqual(['记录 & 备注', '空表']);

    const sheet = await reader.readSheet('记录 & 备注');
    expect(sheet.rows).toEqual([
      ['姓名', '消息内容', '金额'],
      ['张三', '电话138 1234 5678', '42'],
      ['', '', ''],
      ['true', '', '3.25'],
      ['', 'a <b>', ''],
    ]);
    expect(await reader.rowCount('记录 & 备注')).toBe(4);
    expect(await reader.columnNames('记录 & 备注')).toEqual(['姓名', '消息内容', '金额']);
  });

  it('starts the grid at the first used row and column', async () => {
    const buffer = await singleSheetWorkbook(
      '<row r="1"><c r="A1" s="1"/></row>' +
        '<row r="2"><c r="B2" t="inlineStr"><is><t>姓名</t></is></c><c r="C2" t="inlineStr"><is><t>消息内容</t></is></c></row>' +
        '<row r="3"><c r="B3" t="inlineStr"><is><t>张三</t></is></c><c r="C3" t="inlineStr"><is><t>电话13812345678</t></is></c></row>',
    );

    const sheet = await (await WorkbookReader.fromBuffer(buffer)).readSheet('Sheet1');

    expect(sheet.rows).toEqual([
      ['姓名', '消息内容'],
      ['张三', '电话13812345678'],
    ]);
    expect(sheet.columnNames()).toEqual(['姓名', '消息内容']);
    expect(sheet.column('消息内容')).toEqual([[1, '电话13812345678']]);
    expect(sheet.firstRow).toBe(1);
    expect(sheet.sheetRowNumber(1)).toBe(3);
  });

  it('keeps shared-string indexes aligned across self-closing items and runs', async () => {
    const buffer = await singleSheetWorkbook(
      '<row r="1"><c r="A1" t="s"><v>1</v></c></row>' +
        '<row r="2"><c r="A2" t="s"><v>2</v></c><c r="B2"><v/></c></row>',
      '<sst><si/><si><t>消息内容</t></si>' +
        '<si><r><t xml:space="preserve"/></r><r><t>电话13812345678</t></r></si></sst>',
    );

    const sheet = await (await WorkbookReader.fromBuffer(buffer)).readSheet('Sheet1');

    expect(sheet.rows).toEqual([['消息内容'], ['电话13812345678']]);
  });

  it('returns an empty grid for an empty sheet', async () => {
    const reader = await WorkbookReader.fromBuffer(await handBuiltWorkbook());

    expect((await reader.readSheet('空表')).rows).toEqual([]);
    expect(await reader.rowCount('空表')).toBe(0);
  });

  it('round-trips what WorkbookWriter produces', async () => {
    const writer = new WorkbookWriter();
    writer.addSheet('Sheet1').appendRow(['姓名', '消息内容']).appendRow(['张三', '电话13812345678']);
    writer.addSheet('第二页').appendRow(['编号', { value: 'x"y', style: 'header' }]).appendRow([7, 'a&b']);

    const reader = await WorkbookReader.fromBuffer(await writer.toBuffer());

    expect(reader.sheetNames()).toEqual(['Sheet1', '第二页']);
    expect((await reader.readSheet('Sheet1')).rows).toEqual([
      ['姓名', '消息内容'],
      ['张三', '电话13812345678'],
    ]);
    expect((await reader.readSheet('第二页')).rows).toEqual([
      ['编号', 'x"y'],
      ['7', 'a&b'],
    ]);
  });

  it('rejects data that is not a workbook', async () => {
    await expect(WorkbookReader.fromBuffer(Buffer.from('not a zip'))).rejects.toBeInstanceOf(WorkbookError);

    const zip = new JSZip();
    zip.file('hello.txt', 'hi');
    await expect(WorkbookReader.fromBuffer(await zip.generateAsync({ type: 'nodebuffer' }))).rejects.toThrow(
      '不是有效的xlsx文件',
    );
  });

  it('rejects a missing file', async () => {
    await expect(WorkbookReader.open('/definitely/missing/file.xlsx')).rejects.toBeInstanceOf(WorkbookError);
  });

  it('rejects an unknown sheet', async () => {
    const reader = await WorkbookReader.fromBuffer(await handBuiltWorkbook());

    await expect(reader.readSheet('不存在')).rejects.toThrow('无法读取工作表: 不存在');
  });
});

describe('parseSheetRows', () => {
  it('reports the used range origin', () => {
    const grid = parseSheetRows(
      '<row r="4"><c r="C4" t="inlineStr"><is><t>a</t></is></c></row>' +
        '<row r="6"><c r="D6" t="inlineStr"><is><t>b</t></is></c></row>',
      [],
    );

    expect(grid).toEqual({
      rows: [
        ['a', ''],
        ['', ''],
        ['', 'b'],
      ],
      firstRow: 3,
      firstColumn: 2,
    });
  });

  it('returns an empty grid without cells', () => {
    expect(parseSheetRows('<row r="1"/>', [])).toEqual({ rows: [], firstRow: 0, firstColumn: 0 });
  });
});

describe('SheetData', () => {
  const sheet = new SheetData([
    ['姓名', '消息内容'],
    ['张三', 'r1'],
    ['李四', 'r2'],
    ['王五', 'r3'],
    ['赵六', 'r4'],
  ]);

  it('looks up columns by name', () => {
    expect(sheet.columnNames()).toEqual(['姓名', '消息内容']);
    expect(sheet.columnIndex('消息内容')).toBe(1);
    expect(sheet.columnIndex('不存在')).toBeUndefined();
    expect(sheet.column('消息内容')).toEqual([
      [1, 'r1'],
      [2, 'r2'],
      [3, 'r3'],
      [4, 'r4'],
    ]);
    expect(() => sheet.column('不存在')).toThrow(ColumnNotFoundError);
  });

  it('collects context rows clipped at the sheet edges', () => {
    expect(sheet.context(3, 1)).toEqual({ before: ['李四 | r2'], after: ['赵六 | r4'] });
    expect(sheet.context(1, 2)).toEqual({ before: [], after: ['李四 | r2', '王五 | r3'] });
    expect(sheet.context(4, 2)).toEqual({ before: ['李四 | r2', '王五 | r3'], after: [] });
    expect(sheet.context(2, 0)).toEqual({ before: [], after: [] });
  });
});

describe('column selection', () => {
  it('prefers the configured column, then the message column, then the first column', () => {
    expect(resolveTargetColumn(['姓名', '消息内容'], '姓名')).toBe('姓名');
    expect(resolveTargetColumn(['姓名', '客户消息内容', '时间'], '')).toBe('客户消息内容');
    expect(resolveTargetColumn(['姓名', '时间'], '')).toBe('姓名');
    expect(resolveTargetColumn([], '')).toBeUndefined();
  });

  it('recommends the message column', () => {
    expect(findRecommendedColumn(['姓名', '消息内容', '时间'])).toBe('消息内容');
    expect(findRecommendedColumn(['姓名'])).toBeUndefined();
  });

  it('keeps a still-valid selection', () => {
    expect(selectColumn(['姓名', '消息内容'], '')).toBe('消息内容');
    expect(selectColumn(['姓名', '消息内容'], '姓名')).toBe('姓名');
    expect(selectColumn(['姓名', '时间'], '备注')).toBe('姓名');
    expect(selectColumn([''], '备注')).toBe('备注');
  });
});

describe('cell helpers', () => {
  it('renders integral numbers without a decimal point', () => {
    expect(formatNumber('42.0')).toBe('42');
    expect(formatNumber('13812345678')).toBe('13812345678');
    expect(formatNumber('1.5E+3')).toBe('1500');
    expect(formatNumber('0.25')).toBe('0.25');
  });

  it('converts between column letters and indexes', () => {
    expect(columnLetterToIndex('A')).toBe(0);
    expect(columnLetterToIndex('Z')).toBe(25);
    expect(columnLetterToIndex('AA')).toBe(26);
    expect(columnIndexToLetter(0)).toBe('A');
    expect(columnIndexToLetter(27)).toBe('AB');
    expect(columnIndexToLetter(701)).toBe('ZZ');
  });

  it('escapes and decodes XML text', () => {
    expect(encodeXml('<a & "b">')).toBe('&lt;a &amp; &quot;b&quot;&gt;');
    expect(decodeXml('&lt;a &amp; &quot;b&quot;&gt; &#20013;&#x6587;')).toBe('<a & "b"> 中文');
  });
});

describe('inspectWorkbook', () => {
  it('collects columns and data row counts per sheet', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'pii-inspect-'));
    try {
      const writer = new WorkbookWriter();
      writer.addSheet('一月').appendRow(['姓名', '消息内容']).appendRow(['张三', 'a']).appendRow(['李四', 'b']);
      writer.addSheet('二月').appendRow(['备注']).appendRow(['c']);
      const filePath = path.join(dir, '记录.xlsx');
      await writer.save(filePath);

      const info = await inspectWorkbook(filePath);
      expect(info.sheetNames).toEqual(['一月', '二月']);
      expect(info.sheetColumns.get('二月')).toEqual(['备注']);
      expect(info.sheetRowCounts.get('一月')).toBe(2);
      expect(info.totalRowCount).toBe(3);
      expect(firstSheetColumns(info)).toEqual(['姓名', '消息内容']);

      expect(await createFileTask(filePath)).toEqual({ filePath, fileName: '记录.xlsx', rowCount: 3 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
