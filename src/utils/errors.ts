/**
 * 錯誤類別
 *
 * 檔案與工作表層級的錯誤會被收斂成單一檔案的結果，不會中斷整批處理；
 * 只有 InputError 會在開始前直接拋出。
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code = 'APP_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * 呼叫端輸入錯誤：沒有檔案、沒有啟用任何類別等
 */
export class InputError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', context);
  }
}

/**
 * 無法開啟或讀取活頁簿、工作表
 */
export class WorkbookError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'WORKBOOK_ERROR', context);
  }
}

export class ColumnNotFoundError extends AppError {
  constructor(column: string, context?: Record<string, unknown>) {
    super(`列不存在: ${column}`, 'COLUMN_NOT_FOUND', { column, ...context });
  }
}

/**
 * 設定檔內容不合法
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

export class ExportError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXPORT_ERROR', context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
