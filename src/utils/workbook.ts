import { readFile } from 'node:fs/promises';
import path from 'node:path';
import JSZip from 'jszip';
import type { FileTask } from '../types';
import { MESSAGE_COLUMN_MARKER } from '../types';
import { ColumnNotFoundError, WorkbookError, errorMessage } from './errors';

// 內容列之間的分隔符
const CELL_SEPARATOR = ' | ';

interface SheetEntry {
  name: string;
  path: string;
}

/**
 * 解析 XML 屬性
 */
function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  const attrPattern = /([\w:.-]+)\s*=\s*"([^"]*)"/g;
  let match: RegExpExecArray | null;
  while ((match = attrPattern.exec(source)) !== null) {
    attributes.set(match[1], decodeXml(match[2]));
  }
  return attributes;
}

export function decodeXml(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|lt|gt|amp|quot|apos);/g, (entity, code: string) => {
    switch (code) {
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      case 'amp':
        return '&';
      case 'quot':
        return '"';
      case 'apos':
        return "'";
      default: {
        const point = code.startsWith('#x') ? parseInt(code.slice(2), 16) : parseInt(code.slice(1), 10);
        return Number.isNaN(point) ? entity : String.fromCodePoint(point);
      }
    }
  });
}

/**
 * 取出 <t> 節點文字並串接（富文本會拆成多個 run）
 */
function collectText(xml: string): string {
  // 注音/拼音標註不是儲存格內容
  const withoutPhonetic = xml.replace(/<rPh\b[\s\S]*?<\/rPh>/g, '');
  // 自閉合的 <t/> 先比對，否則會吞掉後面的 run
  const textPattern = /<t(?:\s[^>]*?)?\/>|<t(?:\s[^>]*)?>([\s\S]*?)<\/t>/g;
  let text = '';
  let match: RegExpExecArray | null;
  while ((match = textPattern.exec(withoutPhonetic)) !== null) {
    text += match[1] === undefined ? '' : decodeXml(match[1]);
  }
  return text;
}

/**
 * 欄位字母轉成 0 起算的索引：A → 0、AA → 26
 */
export function columnLetterToIndex(letters: string): number {
  let index = 0;
  for (const ch of letters.toUpperCase()) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index - 1;
}

/**
 * 數值轉字串：整數不帶小數點
 */
export function formatNumber(raw: string): string {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) return raw;
  return String(value);
}

function cellText(attributes: Map<string, string>, inner: string, sharedStrings: string[]): string {
  const type = attributes.get('t') ?? 'n';
  if (type === 'inlineStr') {
    return collectText(inner);
  }

  const valueMatch = /<v(?:\s[^>]*?)?\/>|<v(?:\s[^>]*)?>([\s\S]*?)<\/v>/.exec(inner);
  if (!valueMatch || valueMatch[1] === undefined) return '';
  const raw = decodeXml(valueMatch[1]);

  switch (type) {
    case 's': {
      const index = Number(raw);
      return Number.isInteger(index) ? sharedStrings[index] ?? '' : '';
    }
    case 'b':
      return raw === '1' ? 'true' : 'false';
    case 'str':
    case 'e':
      return raw;
    default:
      return formatNumber(raw);
  }
}

/**
 * 工作表資料：第 0 列是標題列，也就是第一個有內容的列
 */
export class SheetData {
  /**
   * @param firstRow - 表格第 0 列在試算表中的 0 起算列號
   */
  constructor(
    readonly rows: string[][],
    readonly firstRow = 0,
  ) {}

  /**
   * 表格列索引轉成試算表上看到的 1 起算列號
   */
  sheetRowNumber(rowIndex: number): number {
    return this.firstRow + rowIndex + 1;
  }

  columnNames(): string[] {
    return this.rows[0] ? [...this.rows[0]] : [];
  }

  columnIndex(columnName: string): number | undefined {
    const index = this.columnNames().indexOf(columnName);
    return index === -1 ? undefined : index;
  }

  /**
   * 取得整欄內容（不含標題列），回傳 [列索引, 內容]
   */
  column(columnName: string): Array<[rowIndex: number, value: string]> {
    const columnIndex = this.columnIndex(columnName);
    if (columnIndex === undefined) {
      throw new ColumnNotFoundError(columnName);
    }

    const values: Array<[number, string]> = [];
    for (let rowIndex = 1; rowIndex < this.rows.length; rowIndex++) {
      values.push([rowIndex, this.rows[rowIndex][columnIndex] ?? '']);
    }
    return values;
  }

  get dataRowCount(): number {
    return Math.max(0, this.rows.length - 1);
  }

  /**
   * 取得指定列的上下文，不含標題列，超出工作表範圍時截斷
   */
  context(rowIndex: number, lines: number): { before: string[]; after: string[] } {
    const before: string[] = [];
    const after: string[] = [];

    for (let i = Math.max(1, rowIndex - lines); i < rowIndex; i++) {
      before.push(this.rows[i].join(CELL_SEPARATOR));
    }
    for (let i = rowIndex + 1; i <= Math.min(this.rows.length - 1, rowIndex + lines); i++) {
      after.push(this.rows[i].join(CELL_SEPARATOR));
    }

    return { before, after };
  }
}

/**
 * 目標欄：優先使用設定值，否則找含「消息内容」的欄，再不然用第一欄
 */
export function resolveTargetColumn(columns: string[], configured: string): string | undefined {
  if (configured !== '') return configured;
  return findRecommendedColumn(columns) ?? columns[0];
}

export function findRecommendedColumn(columns: string[]): string | undefined {
  return columns.find((column) => column.includes(MESSAGE_COLUMN_MARKER));
}

/**
 * 匯入檔案後挑選欄位：目前選擇仍存在就保留，否則用推薦欄，再不然用第一個非空欄名
 */
export function selectColumn(columns: string[], current: string): string {
  if (current !== '' && columns.includes(current)) return current;

  const recommended = findRecommendedColumn(columns);
  if (recommended !== undefined) return recommended;

  const first = columns[0];
  return first !== undefined && first !== '' ? first : current;
}

/**
 * 以 jszip 讀取 .xlsx
 */
export class WorkbookReader {
  private readonly sheetCache = new Map<string, SheetData>();
  private sharedStrings?: string[];

  private constructor(
    private readonly zip: JSZip,
    private readonly sheets: SheetEntry[],
    private readonly source: string,
  ) {}

  static async open(filePath: string): Promise<WorkbookReader> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      throw new WorkbookError(`无法打开Excel文件: ${filePath}`, { cause: errorMessage(error) });
    }
    return WorkbookReader.fromBuffer(data, filePath);
  }

  static async fromBuffer(data: Buffer | Uint8Array, source = '<buffer>'): Promise<WorkbookReader> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      throw new WorkbookError(`无法打开Excel文件: ${source}`, { cause: errorMessage(error) });
    }

    const workbookXml = await zip.file('xl/workbook.xml')?.async('string');
    if (workbookXml === undefined) {
      throw new WorkbookError(`不是有效的xlsx文件: ${source}`);
    }

    const targets = await readRelationships(zip);
    const sheets: SheetEntry[] = [];
    const sheetPattern = /<sheet\b([^>]*?)\/?>/g;
    let match: RegExpExecArray | null;
    while ((match = sheetPattern.exec(workbookXml)) !== null) {
      const attributes = parseAttributes(match[1]);
      const name = attributes.get('name');
      const target = targets.get(attributes.get('r:id') ?? '');
      if (name !== undefined && target !== undefined) {
        sheets.push({ name, path: target });
      }
    }

    return new WorkbookReader(zip, sheets, source);
  }

  sheetNames(): string[] {
    return this.sheets.map((sheet) => sheet.name);
  }

  async readSheet(sheetName: string): Promise<SheetData> {
    const cached = this.sheetCache.get(sheetName);
    if (cached) return cached;

    const entry = this.sheets.find((sheet) => sheet.name === sheetName);
    const xml = entry ? await this.zip.file(entry.path)?.async('string') : undefined;
    if (xml === undefined) {
      throw new WorkbookError(`无法读取工作表: ${sheetName}`, { source: this.source });
    }

    const grid = parseSheetRows(xml, await this.loadSharedStrings());
    const sheet = new SheetData(grid.rows, grid.firstRow);
    this.sheetCache.set(sheetName, sheet);
    return sheet;
  }

  async columnNames(sheetName: string): Promise<string[]> {
    return (await this.readSheet(sheetName)).columnNames();
  }

  /**
   * 資料列數（不含標題列）
   */
  async rowCount(sheetName: string): Promise<number> {
    return (await this.readSheet(sheetName)).dataRowCount;
  }

  private async loadSharedStrings(): Promise<string[]> {
    if (this.sharedStrings) return this.sharedStrings;

    const xml = await this.zip.file('xl/sharedStrings.xml')?.async('string');
    const strings: string[] = [];
    if (xml !== undefined) {
      const itemPattern = /<si(?:\s[^>]*?)?\/>|<si(?:\s[^>]*)?>([\s\S]*?)<\/si>/g;
      let match: RegExpExecArray | null;
      while ((match = itemPattern.exec(xml)) !== null) {
        strings.push(match[1] === undefined ? '' : collectText(match[1]));
      }
    }

    this.sharedStrings = strings;
    return strings;
  }
}

async function readRelationships(zip: JSZip): Promise<Map<string, string>> {
  const targets = new Map<string, string>();
  const xml = await zip.file('xl/_rels/workbook.xml.rels')?.async('string');
  if (xml === undefined) return targets;

  const relPattern = /<Relationship\b([^>]*?)\/?>/g;
  let match: RegExpExecArray | null;
  while ((match = relPattern.exec(xml)) !== null) {
    const attributes = parseAttributes(match[1]);
    const id = attributes.get('Id');
    const target = attributes.get('Target');
    if (id === undefined || target === undefined) continue;
    targets.set(id, target.startsWith('/') ? target.slice(1) : path.posix.join('xl', target));
  }
  return targets;
}

export interface SheetGrid {
  rows: string[][];
  // 已使用範圍左上角（0 起算）
  firstRow: number;
  firstColumn: number;
}

/**
 * 把工作表 XML 轉成矩形字串表格，範圍從第一個有內容的列與欄開始
 */
export function parseSheetRows(xml: string, sharedStrings: string[]): SheetGrid {
  const cells = new Map<number, Map<number, string>>();
  let minRow = Number.POSITIVE_INFINITY;
  let minColumn = Number.POSITIVE_INFINITY;
  let maxRow = -1;
  let maxColumn = -1;

  const rowPattern = /<row\b([^>]*?)(?:\/>|>([\s\S]*?)<\/row>)/g;
  const cellPattern = /<c\b([^>]*?)(?:\/>|>([\s\S]*?)<\/c>)/g;
  let implicitRow = 0;
  let rowMatch: RegExpExecArray | null;

  while ((rowMatch = rowPattern.exec(xml)) !== null) {
    const rowAttributes = parseAttributes(rowMatch[1]);
    const rowIndex = rowAttributes.has('r') ? Number(rowAttributes.get('r')) - 1 : implicitRow;
    implicitRow = rowIndex + 1;

    const rowCells = new Map<number, string>();
    let implicitColumn = 0;
    let cellMatch: RegExpExecArray | null;
    cellPattern.lastIndex = 0;
    while ((cellMatch = cellPattern.exec(rowMatch[2] ?? '')) !== null) {
      const attributes = parseAttributes(cellMatch[1]);
      const ref = /^([A-Za-z]+)\d*$/.exec(attributes.get('r') ?? '');
      const columnIndex = ref ? columnLetterToIndex(ref[1]) : implicitColumn;
      implicitColumn = columnIndex + 1;

      const text = cellText(attributes, cellMatch[2] ?? '', sharedStrings);
      if (text === '') continue;
      rowCells.set(columnIndex, text);
      minColumn = Math.min(minColumn, columnIndex);
      maxColumn = Math.max(maxColumn, columnIndex);
    }

    if (rowCells.size > 0) {
      cells.set(rowIndex, rowCells);
      minRow = Math.min(minRow, rowIndex);
      maxRow = Math.max(maxRow, rowIndex);
    }
  }

  if (maxRow < 0) {
    return { rows: [], firstRow: 0, firstColumn: 0 };
  }

  const rows: string[][] = [];
  for (let r = minRow; r <= maxRow; r++) {
    const rowCells = cells.get(r);
    const row: string[] = [];
    for (let c = minColumn; c <= maxColumn; c++) {
      row.push(rowCells?.get(c) ?? '');
    }
    rows.push(row);
  }
  return { rows, firstRow: minRow, firstColumn: minColumn };
}

export interface WorkbookInfo {
  sheetNames: string[];
  sheetColumns: Map<string, string[]>;
  sheetRowCounts: Map<string, number>;
  totalRowCount: number;
}

/**
 * 讀取活頁簿的欄位與列數，供建立任務與選欄使用
 */
export async function inspectWorkbook(filePath: string): Promise<WorkbookInfo> {
  const reader = await WorkbookReader.open(filePath);
  const sheetNames = reader.sheetNames();
  const sheetColumns = new Map<string, string[]>();
  const sheetRowCounts = new Map<string, number>();
  let totalRowCount = 0;

  for (const name of sheetNames) {
    const sheet = await reader.readSheet(name);
    sheetColumns.set(name, sheet.columnNames());
    sheetRowCounts.set(name, sheet.dataRowCount);
    totalRowCount += sheet.dataRowCount;
  }

  return { sheetNames, sheetColumns, sheetRowCounts, totalRowCount };
}

export function firstSheetColumns(info: WorkbookInfo): string[] {
  const first = info.sheetNames[0];
  return first === undefined ? [] : info.sheetColumns.get(first) ?? [];
}

export async function createFileTask(filePath: string): Promise<FileTask> {
  const info = await inspectWorkbook(filePath);
  return {
    filePath,
    fileName: path.basename(filePath),
    rowCount: info.totalRowCount,
  };
}
