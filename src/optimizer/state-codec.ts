/**
 * オプティマイザー状態のシリアライズ / デシリアライズ
 *
 * 永続化フォーマットは snake_case のフラットなJSON。
 * 読み込み時の欠落フィールドは以下で補完する:
 * - baseline_margin / last_safe_margin / current_margin: コンストラクタの baselineMargin
 * - step: コンストラクタの step
 * - baseline_srpm / baseline_bid_rate / baseline_profit: null（未設定）
 * - history: []（直近 historyLimit 件に切り詰め）
 *
 * JSONとして壊れている、または型が合わない場合は null を返す。
 * 一部だけ読めた値を使うことはしない。
 */

import { z } from "zod";
import { STATE } from "../constants";
import { trimHistory } from "./guarded-optimizer";
import { HistoryEntry, OptimizerSettings, OptimizerState } from "./types";

// =============================================================================
// スキーマ
// =============================================================================

/**
 * 数値、または数値として解釈できる文字列
 */
const numeric = z.preprocess(
  (value) => (typeof value === "string" && value.trim() !== "" ? Number(value) : value),
  z.number().finite()
);

const HistoryEntryRecordSchema = z.object({
  margin: numeric.default(0),
  impressions: numeric.default(0),
  revenue: numeric.default(0),
  cost: numeric.default(0),
  bid_rate: numeric.default(0),
  responses: numeric.default(0),
  profit: numeric.default(0),
  profit_per_1k: numeric.default(0),
  revenue_per_1k: numeric.default(0),
  cost_per_1k: numeric.default(0),
  srpm: numeric.default(0),
  impression_rate: numeric.default(0),
});

export const OptimizerStateRecordSchema = z.object({
  version: z.literal(STATE.SCHEMA_VERSION).optional(),
  baseline_margin: numeric.optional(),
  last_safe_margin: numeric.optional(),
  current_margin: numeric.optional(),
  step: numeric.optional(),
  baseline_srpm: numeric.nullish(),
  baseline_bid_rate: numeric.nullish(),
  baseline_profit: numeric.nullish(),
  history: z.array(HistoryEntryRecordSchema).optional(),
});

export type OptimizerStateRecord = z.infer<typeof OptimizerStateRecordSchema>;
type HistoryEntryRecord = z.infer<typeof HistoryEntryRecordSchema>;

export type StateDefaults = Pick<OptimizerSettings, "baselineMargin" | "step" | "historyLimit">;

/**
 * デコード結果（失敗理由をログに残すため）
 */
export type DecodeResult =
  | { ok: true; state: OptimizerState }
  | { ok: false; reason: string };

// =============================================================================
// 変換
// =============================================================================

function historyEntryToRecord(entry: HistoryEntry): HistoryEntryRecord {
  return {
    margin: entry.margin,
    impressions: entry.impressions,
    revenue: entry.revenue,
    cost: entry.cost,
    bid_rate: entry.bidRate,
    responses: entry.responses,
    profit: entry.profit,
    profit_per_1k: entry.profitPer1k,
    revenue_per_1k: entry.revenuePer1k,
    cost_per_1k: entry.costPer1k,
    srpm: entry.srpm,
    impression_rate: entry.impressionRate,
  };
}

function recordToHistoryEntry(record: HistoryEntryRecord): HistoryEntry {
  return {
    margin: record.margin,
    impressions: record.impressions,
    revenue: record.revenue,
    cost: record.cost,
    bidRate: record.bid_rate,
    responses: record.responses,
    profit: record.profit,
    profitPer1k: record.profit_per_1k,
    revenuePer1k: record.revenue_per_1k,
    costPer1k: record.cost_per_1k,
    srpm: record.srpm,
    impressionRate: record.impression_rate,
  };
}

/**
 * 状態を永続化用レコードに変換
 */
export function stateToRecord(
  state: OptimizerState,
  historyLimit: number = STATE.HISTORY_LIMIT
): OptimizerStateRecord {
  return {
    version: state.version,
    baseline_margin: state.baselineMargin,
    last_safe_margin: state.lastSafeMargin,
    current_margin: state.currentMargin,
    step: state.step,
    baseline_srpm: state.baselineSrpm,
    baseline_bid_rate: state.baselineBidRate,
    baseline_profit: state.baselineProfit,
    history: trimHistory(state.history, historyLimit).map(historyEntryToRecord),
  };
}

/**
 * 永続化用レコードを状態に変換（欠落フィールドは defaults で補完）
 */
export function recordToState(record: OptimizerStateRecord, defaults: StateDefaults): OptimizerState {
  const history = (record.history ?? []).map(recordToHistoryEntry);

  return {
    version: STATE.SCHEMA_VERSION,
    baselineMargin: record.baseline_margin ?? defaults.baselineMargin,
    lastSafeMargin: record.last_safe_margin ?? defaults.baselineMargin,
    currentMargin: record.current_margin ?? defaults.baselineMargin,
    step: record.step ?? defaults.step,
    baselineSrpm: record.baseline_srpm ?? null,
    baselineBidRate: record.baseline_bid_rate ?? null,
    baselineProfit: record.baseline_profit ?? null,
    history: trimHistory(history, defaults.historyLimit),
  };
}

// =============================================================================
// エンコード / デコード
// =============================================================================

/**
 * 状態をJSON文字列に変換
 */
export function encodeState(
  state: OptimizerState,
  historyLimit: number = STATE.HISTORY_LIMIT
): string {
  return JSON.stringify(stateToRecord(state, historyLimit), null, 2);
}

/**
 * JSON文字列を検証して状態に変換
 */
export function tryDecodeState(raw: string, defaults: StateDefaults): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = OptimizerStateRecordSchema.safeParse(parsed);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason: `schema mismatch: ${reason}` };
  }

  return { ok: true, state: recordToState(result.data, defaults) };
}

/**
 * JSON文字列を状態に変換。失敗時は null
 */
export function decodeState(raw: string, defaults: StateDefaults): OptimizerState | null {
  const result = tryDecodeState(raw, defaults);
  return result.ok ? result.state : null;
}
