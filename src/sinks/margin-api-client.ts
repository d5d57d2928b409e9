/**
 * マージン更新APIクライアント
 *
 * UPDATE_MARGIN_API_URL が未設定の場合は更新内容をログに出して成功扱いにする。
 * 失敗時のリトライは行わない（呼び出し側の責務）。
 */

import { PLATFORM_API } from "../constants";
import { logger } from "../logger";
import { buildHeaders } from "../sources/api-window-source";
import { withTimeout } from "../utils/retry";

export interface MarginSink {
  updateMargin(margin: number): Promise<boolean>;
}

export interface MarginApiClientOptions {
  updateMarginApiUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

export class MarginApiClient implements MarginSink {
  constructor(private readonly options: MarginApiClientOptions = {}) {}

  /**
   * マージン（%）を更新する
   * @returns 成功した場合 true
   */
  async updateMargin(margin: number): Promise<boolean> {
    const url = this.options.updateMarginApiUrl;
    if (!url) {
      logger.info("[MOCK] Would update margin (UPDATE_MARGIN_API_URL not set)", { margin });
      return true;
    }

    try {
      const response = await withTimeout(
        () =>
          fetch(url, {
            method: "POST",
            headers: buildHeaders(this.options.apiKey),
            body: JSON.stringify({ margin }),
          }),
        this.options.timeoutMs ?? PLATFORM_API.TIMEOUT_MS,
        "update-margin"
      );

      if (!response.ok) {
        logger.error("Margin update rejected", { margin, status: response.status });
        return false;
      }

      logger.info("Margin updated via platform API", { margin });
      return true;
    } catch (error) {
      logger.error("Margin update request failed", {
        margin,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
