/**
 * 敏感資訊的正則掃描器
 *
 * 回傳的位置是 UTF-8 位元組位置（不是 JS 字串索引），
 * 以便與匯出檔和其他系統對齊。
 */

export interface Candidate {
  value: string;
  start: number;
  end: number;
}

// 非數字字元
const NON_DIGIT = /\D/g;

// 手機號：可選 +86 前綴，允許 - 或空白分隔
export const PHONE_PATTERN = /(?<!\d)(?:\+?86[-\s]?)?1[3-9]\d[-\s]?\d{4}[-\s]?\d{4}(?!\d)/g;

// 身份證號：地區碼 + 出生日期 + 順序碼 + 校驗碼
export const ID_CARD_PATTERN =
  /(?<!\d)[1-9]\d{5}(?:19|20)\d{2}(?:0[1-9]|1[0-2])(?:0[1-9]|[12]\d|3[01])\d{3}[\dXx](?![\dXx])/g;

// 銀行卡號：刻意放寬到 16-19 位，長度與校驗交給 validator
export const BANK_CARD_PATTERN = /(?<!\d)\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}(?:[-\s]?\d{1,3})?(?!\d)/g;

export function cleanDigits(text: string): string {
  return text.replace(NON_DIGIT, '');
}

/**
 * UTF-8 位元組長度
 */
export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * 依位元組位置取子字串
 */
export function sliceBytes(text: string, start: number, end: number): string {
  return Buffer.from(text, 'utf8').subarray(start, end).toString('utf8');
}

/**
 * 依序掃描所有不重疊的匹配，並把字串索引換算成位元組位置
 */
export function scanPattern(pattern: RegExp, text: string): Candidate[] {
  const candidates: Candidate[] = [];
  // 每次都用新的 RegExp，避免共用 lastIndex
  const re = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);

  let cursor = 0;
  let cursorBytes = 0;
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    const value = match[0];
    if (value.length === 0) {
      re.lastIndex++;
      continue;
    }
    const start = cursorBytes + byteLength(text.slice(cursor, match.index));
    const end = start + byteLength(value);

    candidates.push({ value, start, end });
    cursor = match.index + value.length;
    cursorBytes = end;
  }

  return candidates;
}

export function extractPhones(text: string): Candidate[] {
  return scanPattern(PHONE_PATTERN, text);
}

export function extractIdCards(text: string): Candidate[] {
  return scanPattern(ID_CARD_PATTERN, text);
}

export function extractBankCards(text: string): Candidate[] {
  return scanPattern(BANK_CARD_PATTERN, text);
}
