#!/usr/bin/env node
import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import type { Configuration, FileTask } from '../types';
import { AppError, InputError, errorMessage } from '../utils/errors';
import { exportResults } from '../utils/exporter';
import { FileProcessor, collectResults } from '../utils/fileProcessor';
import { collectXlsxFiles, generateOutputFilename } from '../utils/fileScanner';
import { createLogger } from '../utils/logger';
import { HttpNameService, NameExtractor } from '../utils/nameExtractor';
import { loadSettings } from '../utils/settings';
import { formatStatisticsSummary, generateStatistics, totalSensitiveInfo } from '../utils/statistics';
import { createFileTask } from '../utils/workbook';

const logger = createLogger('cli');

export interface CliOptions {
  column?: string;
  context?: number;
  phone: boolean;
  idCard: boolean;
  bankCard: boolean;
  names?: boolean;
  apiHost?: string;
  concurrency?: number;
  config?: string;
  output?: string;
  checkApi?: boolean;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('必须是非负整数');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('必须是正整数');
  }
  return parsed;
}

/**
 * 只覆寫命令列上明確給出的選項，其餘沿用設定檔
 */
export function applyCliOverrides(
  base: Configuration,
  options: CliOptions,
  isSet: (option: keyof CliOptions) => boolean,
): Configuration {
  const config: Configuration = { ...base };
  if (isSet('column') && options.column !== undefined) config.targetColumn = options.column;
  if (isSet('context') && options.context !== undefined) config.contextLines = options.context;
  if (isSet('phone')) config.enablePhone = options.phone;
  if (isSet('idCard')) config.enableIdCard = options.idCard;
  if (isSet('bankCard')) config.enableBankCard = options.bankCard;
  if (isSet('names') && options.names !== undefined) config.enableName = options.names;
  if (isSet('apiHost') && options.apiHost !== undefined) config.apiHost = options.apiHost;
  return config;
}

async function buildTasks(files: string[]): Promise<FileTask[]> {
  const tasks: FileTask[] = [];
  for (const file of files) {
    try {
      tasks.push(await createFileTask(file));
    } catch (error) {
      logger.error('文件无法读取，已跳过', { file, error: errorMessage(error) });
    }
  }
  return tasks;
}

async function run(paths: string[], options: CliOptions, command: Command): Promise<void> {
  const isSet = (option: keyof CliOptions): boolean => command.getOptionValueSource(option) === 'cli';
  const config = applyCliOverrides(await loadSettings(options.config), options, isSet);

  if (options.checkApi) {
    const health = await new NameExtractor(new HttpNameService(config.apiHost)).checkConnection();
    console.log(health.message);
    process.exitCode = health.ok ? 0 : 1;
    return;
  }

  const files = await collectXlsxFiles(paths);
  if (files.length === 0) {
    throw new InputError('没有找到xlsx文件');
  }

  const tasks = await buildTasks(files);
  if (tasks.length === 0) {
    throw new InputError('没有可处理的文件');
  }

  let lastPercent = -1;
  const processor = new FileProcessor(config, { concurrency: options.concurrency });
  const { outcomes, elapsedSeconds } = await processor.processFiles(tasks, (label, percent) => {
    if (percent === lastPercent) return;
    lastPercent = percent;
    process.stderr.write(`[${String(percent).padStart(3)}%] ${label}\n`);
  });

  for (const outcome of outcomes) {
    if (outcome.status === 'error') {
      console.log(`失败: ${outcome.task.fileName} - ${outcome.message}`);
    }
  }

  const results = collectResults(outcomes);
  const stats = generateStatistics(results, elapsedSeconds);
  console.log(`结果行数: ${stats.totalResults}，敏感信息: ${totalSensitiveInfo(stats)}，耗时: ${elapsedSeconds.toFixed(2)}s`);
  console.log(formatStatisticsSummary(stats));
  if (config.enableName) {
    console.log(`姓名服务失败次数: ${processor.nameFailures}`);
  }

  if (results.length === 0) return;

  const outputPath = options.output ?? path.join(process.cwd(), generateOutputFilename(results[0].sourceFile));
  await exportResults(results, outputPath);
  console.log(`结果已导出到: ${outputPath}`);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pii-scan')
    .description('从xlsx文件中提取手机号、身份证号、银行卡号和姓名')
    .argument('[paths...]', 'xlsx文件或目录')
    .option('-c, --column <name>', '目标列（默认自动识别）')
    .option('-n, --context <lines>', '上下文行数', parseNonNegativeInt)
    .option('--no-phone', '不提取手机号')
    .option('--no-id-card', '不提取身份证号')
    .option('--no-bank-card', '不提取银行卡号')
    .option('--names', '调用姓名服务提取姓名')
    .option('--api-host <host>', '姓名服务地址')
    .option('-j, --concurrency <count>', '并发文件数', parsePositiveInt)
    .option('--config <file>', 'JSON设置文件')
    .option('-o, --output <file>', '导出文件路径')
    .option('--check-api', '只检查姓名服务连接')
    .action(async (paths: string[], options: CliOptions, command: Command) => {
      await run(paths, options, command);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.message, { code: error.code });
    } else {
      logger.error('处理失败', { error: errorMessage(error) });
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
