import type { ExtractionResult, Match } from '../types';
import { ExportError, errorMessage } from './errors';
import { createLogger } from './logger';
import { type CellInput, type SheetDraft, WorkbookWriter } from './workbookWriter';

const logger = createLogger('exporter');

const VALID_TOKEN = '有效';
const INVALID_TOKEN = '无效';

export const RESULT_HEADERS = [
  '源文件名',
  '工作表',
  '行号',
  '手机号',
  '手机号有效性',
  '身份证号',
  '身份证有效性',
  '银行卡号',
  '银行卡有效性',
  '姓名',
  '姓名有效性',
  '源文本',
  '上文',
  '下文',
];

const COLUMN_WIDTHS = [20, 15, 8, 20, 12, 22, 12, 22, 12, 16, 12, 50, 30, 30];

export function formatMatches(matches: Match[]): string {
  return matches.map((match) => match.value).join(', ');
}

export function formatValidity(matches: Match[]): string {
  return matches.map((match) => (match.isValid ? VALID_TOKEN : INVALID_TOKEN)).join(', ');
}

/**
 * 有效性欄位著色：只要有一個無效就標紅
 */
function validityCell(matches: Match[]): CellInput {
  const text = formatValidity(matches);
  if (text === '') return '';
  return { value: text, style: matches.some((match) => !match.isValid) ? 'invalid' : 'valid' };
}

export function formatResultRow(result: ExtractionResult): CellInput[] {
  return [
    result.sourceFile,
    result.sheetName,
    result.rowNumber,
    formatMatches(result.phoneNumbers),
    validityCell(result.phoneNumbers),
    formatMatches(result.idCards),
    validityCell(result.idCards),
    formatMatches(result.bankCards),
    validityCell(result.bankCards),
    formatMatches(result.names),
    validityCell(result.names),
    result.sourceText,
    result.contextBefore.join('\n'),
    result.contextAfter.join('\n'),
  ];
}

/**
 * 提取結果匯出
 */
export class ResultWriter {
  private readonly writer = new WorkbookWriter();
  private readonly sheet: SheetDraft;

  constructor(sheetName = '提取结果') {
    this.sheet = this.writer
      .addSheet(sheetName)
      .setColumnWidths(COLUMN_WIDTHS)
      .setHeaderFeatures(true, true);
  }

  get rowCount(): number {
    return this.sheet.rows.length;
  }

  appendHeader(): this {
    this.sheet.appendRow(RESULT_HEADERS.map((header) => ({ value: header, style: 'header' as const })));
    return this;
  }

  appendResult(result: ExtractionResult): this {
    this.sheet.appendRow(formatResultRow(result));
    return this;
  }

  toBuffer(): Promise<Buffer> {
    return this.writer.toBuffer();
  }

  async save(filePath: string): Promise<void> {
    try {
      await this.writer.save(filePath);
    } catch (error) {
      throw new ExportError(`无法保存文件: ${filePath}`, { cause: errorMessage(error) });
    }
  }
}

export async function exportResults(results: ExtractionResult[], filePath: string): Promise<void> {
  if (results.length === 0) {
    throw new ExportError('没有可导出的结果');
  }

  const writer = new ResultWriter().appendHeader();
  for (const result of results) {
    writer.appendResult(result);
  }
  await writer.save(filePath);

  logger.info('结果已导出', { path: filePath, rows: results.length });
}
