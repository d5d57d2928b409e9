/**
 * メトリクスAPIからのウィンドウ取得
 *
 * METRICS_API_URL が未設定の場合はモックデータを返す。
 */

import { PLATFORM_API } from "../constants";
import { MarginApiError } from "../errors";
import { logger } from "../logger";
import { PerformanceWindow } from "../metrics";
import { withRetryAndTimeout } from "../utils/retry";
import { WindowSource } from "./types";
import { parsePerformanceWindow } from "./window-parser";

export interface ApiWindowSourceOptions {
  metricsApiUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * API未設定時のモックウィンドウ
 */
export const MOCK_PERFORMANCE_WINDOW: Readonly<PerformanceWindow> = {
  margin: 35,
  impressions: 55000,
  revenue: 25.0,
  cost: 16.0,
  bidRate: 1.5,
  responses: 28000,
};

export class ApiWindowSource implements WindowSource {
  readonly name = "api";

  constructor(private readonly options: ApiWindowSourceOptions = {}) {}

  async fetchWindow(): Promise<PerformanceWindow> {
    const url = this.options.metricsApiUrl;
    if (!url) {
      logger.info("[MOCK] Using mock hourly metrics (METRICS_API_URL not set)");
      return { ...MOCK_PERFORMANCE_WINDOW };
    }

    const body = await withRetryAndTimeout(
      async () => {
        const response = await fetch(url, {
          method: "GET",
          headers: buildHeaders(this.options.apiKey),
        });
        if (!response.ok) {
          throw MarginApiError.fromHttpStatus(response.status, await response.text());
        }
        const json: unknown = await response.json();
        return json;
      },
      {
        name: "metrics-api",
        timeoutMs: this.options.timeoutMs ?? PLATFORM_API.TIMEOUT_MS,
      }
    );

    return parsePerformanceWindow(body);
  }
}

/**
 * 認証ヘッダーを生成
 */
export function buildHeaders(apiKey?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (apiKey) {
    headers.Authorization = `Bearer ${apiKey}`;
  }
  return headers;
}
