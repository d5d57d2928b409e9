/**
 * 観測ウィンドウの入力バリデーション
 *
 * 欠落・空文字・null は 0 として扱う。
 * 数値に変換できない文字列は 0 に丸めず ValidationError にする。
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { PerformanceWindow } from "../metrics";

/**
 * 欠落値を 0 とみなす数値スキーマ
 */
export const LenientNumberSchema = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((value, ctx) => {
    if (value === null || value === undefined) {
      return 0;
    }
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a finite number" });
        return z.NEVER;
      }
      return value;
    }
    const trimmed = value.trim();
    if (trimmed === "") {
      return 0;
    }
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `could not convert "${value}" to a number`,
      });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * メトリクスAPIのレスポンス形式
 */
export const PerformanceWindowRecordSchema = z.object({
  margin: LenientNumberSchema,
  impressions: LenientNumberSchema,
  revenue: LenientNumberSchema,
  cost: LenientNumberSchema,
  bid_rate: LenientNumberSchema,
  responses: LenientNumberSchema,
});

/**
 * 単一の値を数値に変換
 * @throws {ValidationError} 数値に変換できない場合
 */
export function parseLenientNumber(value: unknown, field: string): number {
  const result = LenientNumberSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      [{ field, message: result.error.issues[0]?.message ?? "invalid number", received: value }],
      `Invalid numeric value for ${field}`
    );
  }
  return result.data;
}

/**
 * レコードを PerformanceWindow に変換
 * @throws {ValidationError} 数値に変換できないフィールドがある場合
 */
export function parsePerformanceWindow(record: unknown): PerformanceWindow {
  const result = PerformanceWindowRecordSchema.safeParse(record);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, "Invalid performance window");
  }

  const r = result.data;
  return {
    margin: r.margin,
    impressions: r.impressions,
    revenue: r.revenue,
    cost: r.cost,
    bidRate: r.bid_rate,
    responses: r.responses,
  };
}
