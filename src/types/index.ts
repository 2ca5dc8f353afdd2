export type Category = 'phone' | 'idCard' | 'bankCard' | 'name';

export interface Match {
  value: string;
  isValid: boolean;
  position: readonly [start: number, end: number]; // UTF-8 位元組位置，左閉右開
}

export interface CellMatches {
  phoneNumbers: Match[];
  idCards: Match[];
  bankCards: Match[];
  names: Match[];
}

export interface ExtractionResult extends CellMatches {
  sourceFile: string;
  sheetName: string;
  rowNumber: number;    // 試算表上的 1 起算列號
  sourceText: string;
  contextBefore: string[];
  contextAfter: string[];
}

export interface Configuration {
  contextLines: number;
  targetColumn: string;  // 空字串 = 自動偵測
  enablePhone: boolean;
  enableIdCard: boolean;
  enableBankCard: boolean;
  enableName: boolean;
  apiHost: string;
}

export interface ProcessingStatistics {
  totalResults: number;
  totalPhones: number;
  validPhones: number;
  totalIdCards: number;
  validIdCards: number;
  totalBankCards: number;
  validBankCards: number;
  totalNames: number;
  validNames: number;
  elapsedSeconds: number;
}

export interface FileTask {
  filePath: string;
  fileName: string;
  rowCount: number;
}

export type FileStatus =
  | { state: 'pending' }
  | { state: 'processing'; progress: number }
  | { state: 'completed' }
  | { state: 'error'; message: string };

export type FileOutcome =
  | { task: FileTask; status: 'completed'; results: ExtractionResult[] }
  | { task: FileTask; status: 'error'; message: string };

export interface ProcessingRun {
  outcomes: FileOutcome[];
  elapsedSeconds: number;
}

export type ProgressCallback = (label: string, percent: number) => void;

// 類別對應到結果中的欄位
export const CATEGORY_FIELDS: Record<Category, keyof CellMatches> = {
  phone: 'phoneNumbers',
  idCard: 'idCards',
  bankCard: 'bankCards',
  name: 'names',
};

export const CATEGORY_LABELS: Record<Category, string> = {
  phone: '手机号',
  idCard: '身份证号',
  bankCard: '银行卡号',
  name: '姓名',
};

// 自動選欄時優先採用的標題關鍵字
export const MESSAGE_COLUMN_MARKER = '消息内容';
