import os from 'node:os';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type {
  Configuration,
  ExtractionResult,
  FileOutcome,
  FileStatus,
  FileTask,
  ProcessingRun,
  ProgressCallback,
} from '../types';
import { InfoExtractor, hasMatches } from './detector';
import { InputError, errorMessage } from './errors';
import { createLogger } from './logger';
import { HttpNameService, NameExtractor } from './nameExtractor';
import { hasAnyExtractionEnabled } from './settings';
import { WorkbookReader, resolveTargetColumn } from './workbook';

const logger = createLogger('file-processor');

const MIN_PROGRESS_INTERVAL = 100;
const MAX_PROGRESS_INTERVAL = 500;
const DEFAULT_PROGRESS_INTERVAL = 200;

export const STARTED_LABEL = '开始处理';
export const FINISHED_LABEL = '处理完成';

export function processingStatus(progress: number): FileStatus {
  return { state: 'processing', progress: Math.max(0, Math.min(100, Math.floor(progress))) };
}

/**
 * 全域進度：所有 worker 共用的唯一計數器，依列數加權
 */
export class ProgressTracker {
  private processed = 0;
  private lastPercent = 0;

  constructor(
    private readonly totalRows: number,
    private readonly onProgress: ProgressCallback,
  ) {}

  get processedRows(): number {
    return this.processed;
  }

  percent(): number {
    if (this.totalRows <= 0) return 0;
    return Math.min(100, Math.floor((this.processed / this.totalRows) * 100));
  }

  start(): void {
    this.onProgress(STARTED_LABEL, 0);
  }

  /**
   * worker 以自己累積的批次數量呼叫，而不是每列呼叫一次
   */
  advance(label: string, rows: number): void {
    if (rows <= 0) return;
    this.processed += rows;
    // 單調不減
    this.lastPercent = Math.max(this.lastPercent, this.percent());
    this.onProgress(label, this.lastPercent);
  }

  finish(): void {
    this.lastPercent = 100;
    this.onProgress(FINISHED_LABEL, 100);
  }
}

export interface FileProcessorOptions {
  concurrency?: number;
  progressInterval?: number;
  nameExtractor?: NameExtractor;
  onFileStatus?: (task: FileTask, status: FileStatus) => void;
}

/**
 * 固定大小的 worker pool：各 lane 從共用佇列取任務，結果依原始順序回傳
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new InputError(`并发数必须为正整数: ${size}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const lanes = Array.from({ length: Math.min(size, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(lanes);
  return results;
}

export class FileProcessor {
  private readonly extractor: InfoExtractor;
  private readonly nameExtractor?: NameExtractor;
  private readonly concurrency: number;
  private readonly progressInterval: number;
  private readonly onFileStatus?: (task: FileTask, status: FileStatus) => void;

  constructor(
    private readonly config: Configuration,
    options: FileProcessorOptions = {},
  ) {
    this.concurrency = options.concurrency ?? Math.max(1, os.cpus().length);
    this.progressInterval = Math.min(
      MAX_PROGRESS_INTERVAL,
      Math.max(MIN_PROGRESS_INTERVAL, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL),
    );
    this.onFileStatus = options.onFileStatus;

    // 所有檔案共用一個姓名提取器，失敗次數才會累計在一起
    if (config.enableName) {
      this.nameExtractor = options.nameExtractor ?? new NameExtractor(new HttpNameService(config.apiHost));
    }
    this.extractor = new InfoExtractor(config, this.nameExtractor);
  }

  /**
   * 姓名服務失敗次數
   */
  get nameFailures(): number {
    return this.nameExtractor?.failedCount ?? 0;
  }

  /**
   * 平行處理多個檔案；單一檔案失敗不影響其他檔案
   */
  async processFiles(tasks: FileTask[], onProgress: ProgressCallback): Promise<ProcessingRun> {
    if (tasks.length === 0) {
      throw new InputError('请先导入文件');
    }
    if (!hasAnyExtractionEnabled(this.config)) {
      throw new InputError('请至少选择一种提取类型');
    }
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new InputError(`并发数必须为正整数: ${this.concurrency}`);
    }

    const startedAt = performance.now();
    const totalRows = tasks.reduce((sum, task) => sum + Math.max(0, task.rowCount), 0);
    const tracker = new ProgressTracker(totalRows, onProgress);

    logger.info('开始处理', { files: tasks.length, totalRows, concurrency: this.concurrency });
    tasks.forEach((task) => this.onFileStatus?.(task, { state: 'pending' }));
    tracker.start();

    const outcomes = await runPool(tasks, this.concurrency, (task) => this.runTask(task, tracker));

    tracker.finish();
    const elapsedSeconds = (performance.now() - startedAt) / 1000;
    logger.info('处理完成', {
      files: tasks.length,
      failed: outcomes.filter((outcome) => outcome.status === 'error').length,
      elapsedSeconds: Number(elapsedSeconds.toFixed(3)),
    });

    return { outcomes, elapsedSeconds };
  }

  private async runTask(task: FileTask, tracker: ProgressTracker): Promise<FileOutcome> {
    let reported = 0;
    const report = (rows: number): void => {
      reported += rows;
      tracker.advance(task.fileName, rows);
      const progress = task.rowCount > 0 ? (reported / task.rowCount) * 100 : 100;
      this.onFileStatus?.(task, processingStatus(progress));
    };

    this.onFileStatus?.(task, processingStatus(0));
    try {
      const results = await this.processFile(task, report);
      this.onFileStatus?.(task, { state: 'completed' });
      return { task, status: 'completed', results };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('文件处理失败', { file: task.fileName, error: message });
      // 未處理的列也要算進進度，總進度才會走到底
      report(Math.max(0, task.rowCount - reported));
      this.onFileStatus?.(task, { state: 'error', message });
      return { task, status: 'error', message };
    }
  }

  /**
   * 處理單一檔案：逐工作表、逐列依序提取
   */
  async processFile(task: FileTask, report: (rows: number) => void = () => undefined): Promise<ExtractionResult[]> {
    const reader = await WorkbookReader.open(task.filePath);
    const results: ExtractionResult[] = [];
    let pending = 0;

    const flush = async (): Promise<void> => {
      if (pending === 0) return;
      report(pending);
      pending = 0;
      // 讓其他 lane 有機會推進
      await yieldToEventLoop();
    };

    for (const sheetName of reader.sheetNames()) {
      const sheet = await reader.readSheet(sheetName);
      const targetColumn = resolveTargetColumn(sheet.columnNames(), this.config.targetColumn);

      if (targetColumn === undefined || sheet.columnIndex(targetColumn) === undefined) {
        logger.warn('工作表缺少目标列，已跳过', { file: task.fileName, sheet: sheetName, column: targetColumn });
        pending += sheet.dataRowCount;
        continue;
      }

      logger.debug('处理工作表', { file: task.fileName, sheet: sheetName, column: targetColumn });
      for (const [rowIndex, cellValue] of sheet.column(targetColumn)) {
        pending++;

        if (cellValue !== '') {
          const matches = await this.extractor.extract(cellValue);
          if (hasMatches(matches)) {
            const { before, after } = sheet.context(rowIndex, this.config.contextLines);
            results.push({
              sourceFile: task.fileName,
              sheetName,
              rowNumber: sheet.sheetRowNumber(rowIndex),
              sourceText: cellValue,
              contextBefore: before,
              contextAfter: after,
              ...matches,
            });
          }
        }

        if (pending >= this.progressInterval) {
          await flush();
        }
      }
    }

    await flush();
    return results;
  }
}

/**
 * 依檔案順序串接所有成功檔案的結果
 */
export function collectResults(outcomes: FileOutcome[]): ExtractionResult[] {
  return outcomes.flatMap((outcome) => (outcome.status === 'completed' ? outcome.results : []));
}
