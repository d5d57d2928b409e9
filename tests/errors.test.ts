/**
 * エラークラスと統一レスポンスのテスト
 */

import {
  ApiResponseBuilder,
  AppError,
  BigQueryError,
  ErrorCode,
  getRetryDelayMs,
  isRetryableError,
  MarginApiError,
  NotFoundError,
  toAppError,
  ValidationError,
} from "../src/errors";

describe("MarginApiError.fromHttpStatus", () => {
  it("401/403 はリトライしない", () => {
    expect(MarginApiError.fromHttpStatus(403, "")).toMatchObject({ statusCode: 403, retryable: false });
  });

  it("429 は60秒後にリトライ", () => {
    expect(MarginApiError.fromHttpStatus(429, "")).toMatchObject({ retryable: true, retryAfterMs: 60000 });
  });

  it("5xx は5秒後にリトライ", () => {
    expect(MarginApiError.fromHttpStatus(503, "")).toMatchObject({
      message: "Platform API server error: 503",
      retryable: true,
      retryAfterMs: 5000,
    });
  });

  it("その他はレスポンス本文をメッセージに含める", () => {
    expect(MarginApiError.fromHttpStatus(422, "bad margin").message).toBe("Platform API error: bad margin");
  });
});

describe("BigQueryError.fromError", () => {
  it("クォータ超過はリトライ可能", () => {
    expect(BigQueryError.fromError(new Error("Quota exceeded for table"))).toMatchObject({
      code: ErrorCode.BIGQUERY_ERROR,
      retryable: true,
      retryAfterMs: 5000,
    });
  });

  it("権限エラーはリトライ不可", () => {
    expect(BigQueryError.fromError(new Error("Access Denied")).retryable).toBe(false);
  });
});

describe("ValidationError.fromZodError", () => {
  it("issue のパスをフィールド名にする", () => {
    const error = ValidationError.fromZodError({
      issues: [{ path: ["history", 0, "bid_rate"], message: "Expected number" }],
    });

    expect(error.errors).toEqual([{ field: "history.0.bid_rate", message: "Expected number" }]);
    expect(error.message).toBe("Validation failed");
  });
});

describe("NotFoundError", () => {
  it("識別子付きメッセージ", () => {
    expect(new NotFoundError("CSV row for arm", "LowMar").message).toBe("CSV row for arm not found: LowMar");
    expect(new NotFoundError("Hour with impressions").message).toBe("Hour with impressions not found");
  });
});

describe("isRetryableError / getRetryDelayMs", () => {
  it("AppError は retryable に従う", () => {
    expect(isRetryableError(MarginApiError.fromHttpStatus(500, ""))).toBe(true);
    expect(isRetryableError(new NotFoundError("x"))).toBe(false);
  });

  it("一般的なネットワークエラーはリトライ可能", () => {
    expect(isRetryableError(new Error("socket hang up: ECONNRESET"))).toBe(true);
    expect(isRetryableError(new Error("bad input"))).toBe(false);
    expect(isRetryableError("timeout")).toBe(false);
  });

  it("retryAfterMs が無ければ指数バックオフ（最大30秒）", () => {
    expect(getRetryDelayMs(new Error("x"), 0)).toBe(1000);
    expect(getRetryDelayMs(new Error("x"), 3)).toBe(8000);
    expect(getRetryDelayMs(new Error("x"), 10)).toBe(30000);
    expect(getRetryDelayMs(MarginApiError.fromHttpStatus(429, ""), 0)).toBe(60000);
  });
});

describe("ApiResponseBuilder", () => {
  it("成功レスポンス", () => {
    expect(ApiResponseBuilder.success({ nextMargin: 36 })).toMatchObject({
      success: true,
      statusCode: 200,
      data: { nextMargin: 36 },
    });
  });

  it("AppError からエラーレスポンス", () => {
    expect(ApiResponseBuilder.error(new NotFoundError("arm", "x"))).toMatchObject({
      success: false,
      statusCode: 404,
      error: { code: "NOT_FOUND", message: "arm not found: x", retryable: false },
    });
  });

  it("AppError 以外は INTERNAL_ERROR", () => {
    const converted = toAppError("boom");

    expect(converted).toBeInstanceOf(AppError);
    expect(converted).toMatchObject({ code: "INTERNAL_ERROR", message: "boom", statusCode: 500 });
  });
});
