import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { DateTime } from 'luxon';

export function isXlsxFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.xlsx';
}

/**
 * 遞迴找出目錄下所有 .xlsx，略過隱藏目錄，依檔名排序
 */
export async function scanXlsxFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  try {
    await scanRecursive(dir, files);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  return files.sort((a, b) => path.basename(a).localeCompare(path.basename(b)));
}

async function scanRecursive(dir: string, files: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name.startsWith('.')) continue;
      await scanRecursive(fullPath, files);
    } else if (isXlsxFile(entry.name)) {
      files.push(fullPath);
    }
  }
}

/**
 * 展開使用者給的路徑（檔案或目錄），排序並去重
 */
export async function collectXlsxFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const input of paths) {
    const info = await stat(input).catch(() => undefined);
    if (info?.isDirectory()) {
      files.push(...(await scanXlsxFiles(input)));
    } else if (isXlsxFile(input)) {
      files.push(path.resolve(input));
    }
  }
  return [...new Set(files.map((file) => path.resolve(file)))].sort();
}

export function generateOutputFilename(sourceName: string, now: DateTime = DateTime.local()): string {
  const base = sourceName.replace(/\.xlsx$/i, '');
  return `${base}_${now.toFormat('yyyyMMdd_HHmmss')}.xlsx`;
}
