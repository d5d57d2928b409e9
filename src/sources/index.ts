/**
 * ウィンドウソース - エントリーポイント
 */

export * from "./types";
export * from "./window-parser";
export * from "./analytics-csv";
export * from "./csv-window-source";
export * from "./api-window-source";
