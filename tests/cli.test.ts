import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CliOptions } from '../src/cli';
import { applyCliOverrides, main } from '../src/cli';
import { DEFAULT_CONFIGURATION } from '../src/utils/settings';
import { WorkbookReader } from '../src/utils/workbook';
import { WorkbookWriter } from '../src/utils/workbookWriter';

describe('applyCliOverrides', () => {
  const options: CliOptions = {
    column: '备注',
    context: 0,
    phone: false,
    idCard: true,
    bankCard: true,
    names: true,
    apiHost: '10.0.0.5:9000',
  };

  it('keeps the base configuration for options left at their defaults', () => {
    expect(applyCliOverrides(DEFAULT_CONFIGURATION, options, () => false)).toEqual(DEFAULT_CONFIGURATION);
  });

  it('applies options given on the command line', () => {
    const given = new Set<keyof CliOptions>(['column', 'phone', 'names']);

    expect(applyCliOverrides(DEFAULT_CONFIGURATION, options, (option) => given.has(option))).toEqual({
      ...DEFAULT_CONFIGURATION,
      targetColumn: '备注',
      enablePhone: false,
      enableName: true,
    });
  });
});

describe('main', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'pii-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('scans a directory and exports the results', async () => {
    const writer = new WorkbookWriter();
    writer
      .addSheet('Sheet1')
      .appendRow(['姓名', '消息内容'])
      .appendRow(['张三', '电话13812345678'])
      .appendRow(['李四', '你好']);
    await writer.save(path.join(dir, 'records.xlsx'));
    const output = path.join(dir, 'result.xlsx');

    await main(['node', 'pii-scan', dir, '-o', output, '-j', '1']);

    expect(process.exitCode).toBeUndefined();
    const sheet = await (await WorkbookReader.open(output)).readSheet('提取结果');
    expect(sheet.dataRowCount).toBe(1);
    expect(sheet.rows[1].slice(0, 5)).toEqual(['records.xlsx', 'Sheet1', '2', '13812345678', '有效']);
    expect(console.log).toHaveBeenCalledWith('手机号: 1 (有效 1)');
    expect(console.log).toHaveBeenCalledWith(`结果已导出到: ${output}`);
  });

  it('fails when no workbook is found', async () => {
    await main(['node', 'pii-scan', dir]);

    expect(process.exitCode).toBe(1);
  });

  it('fails when every category is switched off', async () => {
    await new WorkbookWriter().save(path.join(dir, 'empty.xlsx'));

    await main(['node', 'pii-scan', dir, '--no-phone', '--no-id-card', '--no-bank-card']);

    expect(process.exitCode).toBe(1);
  });
});
