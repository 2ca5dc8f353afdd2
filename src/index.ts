export * from './types';
export { InfoExtractor, enabledCategories, hasMatches, isOverlapping } from './utils/detector';
export { AppError, ColumnNotFoundError, ConfigurationError, ExportError, InputError, WorkbookError } from './utils/errors';
export { ResultWriter, exportResults, formatMatches, formatValidity } from './utils/exporter';
export { FileProcessor, ProgressTracker, collectResults, runPool } from './utils/fileProcessor';
export type { FileProcessorOptions } from './utils/fileProcessor';
export { collectXlsxFiles, generateOutputFilename, isXlsxFile, scanXlsxFiles } from './utils/fileScanner';
export { createLogger } from './utils/logger';
export { HttpNameService, NameExtractor } from './utils/nameExtractor';
export type { HealthCheck, NameLookup, NameService } from './utils/nameExtractor';
export { cleanDigits, extractBankCards, extractIdCards, extractPhones, sliceBytes } from './utils/patterns';
export type { Candidate } from './utils/patterns';
export { DEFAULT_CONFIGURATION, hasAnyExtractionEnabled, loadSettings, resolveConfiguration, saveSettings } from './utils/settings';
export { formatStatisticsSummary, generateStatistics, totalSensitiveInfo } from './utils/statistics';
export { daysInMonth, luhnCheck, validateBankCard, validateIdCard, validatePhone } from './utils/validator';
export {
  SheetData,
  WorkbookReader,
  createFileTask,
  findRecommendedColumn,
  firstSheetColumns,
  inspectWorkbook,
  selectColumn,
} from './utils/workbook';
export type { WorkbookInfo } from './utils/workbook';
export { WorkbookWriter } from './utils/workbookWriter';
