import type { Category, CellMatches, Configuration, Match } from '../types';
import { CATEGORY_FIELDS } from '../types';
import { HttpNameService, NameExtractor } from './nameExtractor';
import { type Candidate, extractBankCards, extractIdCards, extractPhones } from './patterns';
import { validateBankCard, validateIdCard, validatePhone } from './validator';

type StructuredCategory = Exclude<Category, 'name'>;

interface CategoryDetector {
  category: StructuredCategory;
  scan: (text: string) => Candidate[];
  validate: (value: string) => boolean;
  // 與這些類別的「有效」匹配重疊時，候選直接捨棄
  suppressedBy?: StructuredCategory[];
}

// 偵測順序：被抑制的類別必須排在抑制它的類別之後
const DETECTORS: CategoryDetector[] = [
  { category: 'phone', scan: extractPhones, validate: validatePhone },
  { category: 'idCard', scan: extractIdCards, validate: validateIdCard },
  {
    category: 'bankCard',
    scan: extractBankCards,
    validate: validateBankCard,
    // 有效的身份證號常被誤判為 18 位卡號
    suppressedBy: ['idCard'],
  },
];

type Span = readonly [number, number];

/**
 * 檢查範圍是否重疊
 */
export function isOverlapping(start: number, end: number, spans: readonly Span[]): boolean {
  return spans.some(([s, e]) => start < e && end > s);
}

export function emptyCellMatches(): CellMatches {
  return { phoneNumbers: [], idCards: [], bankCards: [], names: [] };
}

export function hasMatches(matches: CellMatches): boolean {
  return (
    matches.phoneNumbers.length > 0 ||
    matches.idCards.length > 0 ||
    matches.bankCards.length > 0 ||
    matches.names.length > 0
  );
}

export function enabledCategories(config: Configuration): Category[] {
  const categories: Category[] = [];
  if (config.enablePhone) categories.push('phone');
  if (config.enableIdCard) categories.push('idCard');
  if (config.enableBankCard) categories.push('bankCard');
  if (config.enableName) categories.push('name');
  return categories;
}

/**
 * 單一儲存格的提取：正則掃描 → 校驗 → 跨類別過濾，必要時合併姓名服務結果
 */
export class InfoExtractor {
  private readonly enabled: ReadonlySet<Category>;
  private readonly nameExtractor?: NameExtractor;

  constructor(config: Configuration, nameExtractor?: NameExtractor) {
    this.enabled = new Set(enabledCategories(config));
    if (config.enableName) {
      this.nameExtractor = nameExtractor ?? new NameExtractor(new HttpNameService(config.apiHost));
    }
  }

  /**
   * 只跑正則類別（手機、身份證、銀行卡），同步且不依賴外部服務
   */
  detectStructured(text: string): CellMatches {
    const result = emptyCellMatches();
    const validSpans = new Map<StructuredCategory, Span[]>();

    for (const detector of DETECTORS) {
      if (!this.enabled.has(detector.category)) continue;

      const excluded = (detector.suppressedBy ?? []).flatMap((category) => validSpans.get(category) ?? []);
      const matches: Match[] = detector
        .scan(text)
        .filter((candidate) => !isOverlapping(candidate.start, candidate.end, excluded))
        .map((candidate) => ({
          value: candidate.value,
          isValid: detector.validate(candidate.value),
          position: [candidate.start, candidate.end] as const,
        }));

      validSpans.set(
        detector.category,
        matches.filter((match) => match.isValid).map((match) => match.position),
      );
      result[CATEGORY_FIELDS[detector.category]] = matches;
    }

    return result;
  }

  async extract(text: string): Promise<CellMatches> {
    const result = this.detectStructured(text);
    if (this.nameExtractor) {
      result.names = await this.nameExtractor.extract(text);
    }
    return result;
  }
}
