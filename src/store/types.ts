/**
 * 状態ストア - 型定義
 */

/**
 * 状態ストアの種類
 * - local: ローカルファイルのみ
 * - remote: リモート（BigQuery）
 * - local-with-remote: ローカル優先、無ければリモートから読み込む
 */
export type StateStoreKind = "local" | "remote" | "local-with-remote";

/**
 * オプティマイザー状態（JSON文字列）の読み書き
 *
 * load() は状態が存在しないとき null を返す。
 * 中身の妥当性は呼び出し側（state-codec）で検証する。
 */
export interface StateStore {
  readonly kind: StateStoreKind;
  load(): Promise<string | null>;
  save(blob: string): Promise<void>;
}
