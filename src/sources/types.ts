/**
 * ウィンドウソース - 型定義
 */

import { PerformanceWindow } from "../metrics";

/**
 * 1回の実行で1つの観測ウィンドウを供給する
 */
export interface WindowSource {
  readonly name: string;
  fetchWindow(): Promise<PerformanceWindow>;
}
