import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Configuration } from '../types';
import { ConfigurationError, errorMessage } from './errors';

export const configurationSchema = z.object({
  contextLines: z.number().int().min(0),
  targetColumn: z.string(),
  enablePhone: z.boolean(),
  enableIdCard: z.boolean(),
  enableBankCard: z.boolean(),
  enableName: z.boolean(),
  apiHost: z.string().min(1),
}) satisfies z.ZodType<Configuration>;

// 預設：手機、身份證、銀行卡開啟，姓名需要外部服務所以預設關閉
export const DEFAULT_CONFIGURATION: Readonly<Configuration> = Object.freeze({
  contextLines: 2,
  targetColumn: '',
  enablePhone: true,
  enableIdCard: true,
  enableBankCard: true,
  enableName: false,
  apiHost: 'localhost:8080',
});

export function hasAnyExtractionEnabled(config: Configuration): boolean {
  return config.enablePhone || config.enableIdCard || config.enableBankCard || config.enableName;
}

/**
 * 在預設值上套用部分設定並驗證
 */
export function resolveConfiguration(overrides: unknown = {}): Configuration {
  const partial = configurationSchema.partial().safeParse(overrides);
  if (!partial.success) {
    const issue = partial.error.issues[0];
    throw new ConfigurationError(`设置无效: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
  }

  const defined = Object.fromEntries(Object.entries(partial.data).filter(([, value]) => value !== undefined));
  const merged = configurationSchema.safeParse({ ...DEFAULT_CONFIGURATION, ...defined });
  if (!merged.success) {
    throw new ConfigurationError(`设置无效: ${merged.error.issues[0]?.message ?? 'unknown'}`);
  }
  return merged.data;
}

/**
 * 讀取設定檔；檔案不存在時使用預設值
 */
export async function loadSettings(filePath?: string): Promise<Configuration> {
  if (!filePath) return { ...DEFAULT_CONFIGURATION };

  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { ...DEFAULT_CONFIGURATION };
    }
    throw new ConfigurationError(`无法读取设置文件: ${filePath}`, { cause: errorMessage(error) });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`设置文件不是有效的JSON: ${filePath}`, { cause: errorMessage(error) });
  }
  return resolveConfiguration(parsed);
}

export async function saveSettings(filePath: string, config: Configuration): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(configurationSchema.parse(config), null, 2)}\n`, 'utf8');
}
