import type { ExtractionResult, Match, ProcessingStatistics } from '../types';
import { CATEGORY_LABELS } from '../types';

function countValid(matches: Match[]): number {
  return matches.filter((match) => match.isValid).length;
}

export function generateStatistics(results: ExtractionResult[], elapsedSeconds: number): ProcessingStatistics {
  const stats: ProcessingStatistics = {
    totalResults: results.length,
    totalPhones: 0,
    validPhones: 0,
    totalIdCards: 0,
    validIdCards: 0,
    totalBankCards: 0,
    validBankCards: 0,
    totalNames: 0,
    validNames: 0,
    elapsedSeconds,
  };

  for (const result of results) {
    stats.totalPhones += result.phoneNumbers.length;
    stats.validPhones += countValid(result.phoneNumbers);
    stats.totalIdCards += result.idCards.length;
    stats.validIdCards += countValid(result.idCards);
    stats.totalBankCards += result.bankCards.length;
    stats.validBankCards += countValid(result.bankCards);
    stats.totalNames += result.names.length;
    stats.validNames += countValid(result.names);
  }

  return stats;
}

export function totalSensitiveInfo(stats: ProcessingStatistics): number {
  return stats.totalPhones + stats.totalIdCards + stats.totalBankCards + stats.totalNames;
}

/**
 * 統計摘要，例如「手机号: 2 (有效 1)、身份证号: 1 (有效 1)」
 */
export function formatStatisticsSummary(stats: ProcessingStatistics): string {
  const items: Array<[string, number, number]> = [
    [CATEGORY_LABELS.phone, stats.totalPhones, stats.validPhones],
    [CATEGORY_LABELS.idCard, stats.totalIdCards, stats.validIdCards],
    [CATEGORY_LABELS.bankCard, stats.totalBankCards, stats.validBankCards],
    [CATEGORY_LABELS.name, stats.totalNames, stats.validNames],
  ];

  const summary = items
    .filter(([, total]) => total > 0)
    .map(([label, total, valid]) => `${label}: ${total} (有效 ${valid})`)
    .join('、');
  return summary || '未检测到敏感信息';
}
