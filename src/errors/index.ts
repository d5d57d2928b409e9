/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * エラーハンドリングを統一し、適切なリトライ戦略を可能にする
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // リソースエラー (404)
  NOT_FOUND: "NOT_FOUND",

  // 競合 (409)
  CONFLICT: "CONFLICT",

  // 外部サービスエラー (5xx)
  MARGIN_API_ERROR: "MARGIN_API_ERROR",
  BIGQUERY_ERROR: "BIGQUERY_ERROR",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",

  // サーキットブレーカー
  CIRCUIT_OPEN: "CIRCUIT_OPEN",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
  retryable?: boolean;
  retryAfterMs?: number;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    // スタックトレースを保持
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 * 数値でない入力値など、呼び出し元に返すべき変換エラー
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
      retryable: false,
    });
    this.name = "ValidationError";
    this.errors = errors;
  }

  static fromZodError(
    zodError: { issues: Array<{ path: PropertyKey[]; message: string }> },
    message?: string
  ): ValidationError {
    const errors: ValidationErrorDetail[] = zodError.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return new ValidationError(errors, message);
  }
}

// =============================================================================
// リソースエラー
// =============================================================================

/**
 * リソース未検出エラー（404）
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super({
      code: ErrorCode.NOT_FOUND,
      message,
      statusCode: 404,
      details: { resource, identifier },
      retryable: false,
    });
    this.name = "NotFoundError";
  }
}

// =============================================================================
// 外部サービスエラー
// =============================================================================

/**
 * メトリクス取得・マージン更新APIのエラー
 */
export class MarginApiError extends AppError {
  constructor(options: {
    message: string;
    statusCode: number;
    retryable?: boolean;
    retryAfterMs?: number;
    cause?: Error;
  }) {
    super({
      code: ErrorCode.MARGIN_API_ERROR,
      message: options.message,
      statusCode: options.statusCode,
      retryable: options.retryable ?? false,
      retryAfterMs: options.retryAfterMs,
      cause: options.cause,
    });
    this.name = "MarginApiError";
  }

  /**
   * HTTPステータスコードからエラーを生成
   */
  static fromHttpStatus(status: number, responseBody: string): MarginApiError {
    switch (status) {
      case 401:
      case 403:
        return new MarginApiError({
          message: `Platform API rejected credentials: ${status}`,
          statusCode: status,
          retryable: false,
        });
      case 429:
        return new MarginApiError({
          message: "Platform API rate limit exceeded",
          statusCode: 429,
          retryable: true,
          retryAfterMs: 60000,
        });
      case 500:
      case 502:
      case 503:
      case 504:
        return new MarginApiError({
          message: `Platform API server error: ${status}`,
          statusCode: status,
          retryable: true,
          retryAfterMs: 5000,
        });
      default:
        return new MarginApiError({
          message: `Platform API error: ${responseBody}`,
          statusCode: status,
          retryable: false,
        });
    }
  }
}

/**
 * BigQueryエラー
 */
export class BigQueryError extends AppError {
  constructor(
    message: string,
    options?: {
      cause?: Error;
      retryable?: boolean;
      retryAfterMs?: number;
    }
  ) {
    super({
      code: ErrorCode.BIGQUERY_ERROR,
      message,
      statusCode: 500,
      retryable: options?.retryable ?? false,
      retryAfterMs: options?.retryAfterMs,
      cause: options?.cause,
    });
    this.name = "BigQueryError";
  }

  /**
   * BigQueryエラーメッセージからリトライ可能か判定
   */
  static isRetryableMessage(message: string): boolean {
    const retryablePatterns = [
      /rate limit/i,
      /quota exceeded/i,
      /temporarily unavailable/i,
      /service unavailable/i,
      /internal error/i,
      /backendError/i,
      /rateLimitExceeded/i,
    ];
    return retryablePatterns.some((pattern) => pattern.test(message));
  }

  static fromError(error: Error): BigQueryError {
    const retryable = BigQueryError.isRetryableMessage(error.message);
    return new BigQueryError(error.message, {
      cause: error,
      retryable,
      retryAfterMs: retryable ? 5000 : undefined,
    });
  }
}

// =============================================================================
// サーキットブレーカーエラー
// =============================================================================

/**
 * サーキットオープンエラー
 */
export class CircuitOpenError extends AppError {
  public readonly serviceName: string;
  public readonly openedAt: Date;

  constructor(serviceName: string, retryAfterMs: number = 30000) {
    super({
      code: ErrorCode.CIRCUIT_OPEN,
      message: `Circuit breaker is open for ${serviceName}`,
      statusCode: 503,
      details: { serviceName },
      retryable: true,
      retryAfterMs,
    });
    this.name = "CircuitOpenError";
    this.serviceName = serviceName;
    this.openedAt = new Date();
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

export class ConfigurationError extends AppError {
  constructor(message: string, invalidConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: invalidConfig ? { invalidConfig } : undefined,
      retryable: false,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable?: boolean;
  };
  meta: {
    timestamp: string;
  };
}

/**
 * 統一レスポンスビルダー
 */
export class ApiResponseBuilder {
  static success<T>(data: T, statusCode: number = 200): ApiResponse<T> {
    return {
      success: true,
      statusCode,
      data,
      meta: { timestamp: new Date().toISOString() },
    };
  }

  static error(error: unknown): ApiResponse<never> {
    const appError = toAppError(error);
    return {
      success: false,
      statusCode: appError.statusCode,
      error: {
        code: appError.code,
        message: appError.message,
        details: appError.details,
        retryable: appError.retryable,
      },
      meta: { timestamp: new Date().toISOString() },
    };
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * エラーがリトライ可能か判定
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  if (error instanceof Error) {
    // 一般的なリトライ可能パターン
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("network") ||
      message.includes("temporarily unavailable")
    );
  }
  return false;
}

/**
 * リトライ待機時間を取得（ミリ秒）
 */
export function getRetryDelayMs(error: unknown, attempt: number): number {
  if (error instanceof AppError && error.retryAfterMs) {
    return error.retryAfterMs;
  }
  // 指数バックオフ: 1秒, 2秒, 4秒, 8秒... (最大30秒)
  return Math.min(1000 * Math.pow(2, attempt), 30000);
}

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
      retryable: isRetryableError(error),
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
    retryable: false,
  });
}
