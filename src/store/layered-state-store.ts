/**
 * ローカル優先 + リモートフォールバックの状態ストア
 *
 * - load: ローカルに状態があればそれを返す（中身が壊れていても返す）。
 *   ローカルに無いときだけリモートを参照する
 * - save: ローカルに書き込んだ後、リモートへベストエフォートで同期する
 */

import { logger } from "../logger";
import { StateStore } from "./types";

export class LayeredStateStore implements StateStore {
  readonly kind = "local-with-remote" as const;

  constructor(
    private readonly local: StateStore,
    private readonly remote: StateStore
  ) {}

  async load(): Promise<string | null> {
    const localBlob = await this.local.load();
    if (localBlob !== null) {
      return localBlob;
    }

    try {
      const remoteBlob = await this.remote.load();
      if (remoteBlob !== null) {
        logger.info("Loaded optimizer state from remote store", { remote: this.remote.kind });
      }
      return remoteBlob;
    } catch (error) {
      logger.warn("Failed to load optimizer state from remote store", {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async save(blob: string): Promise<void> {
    await this.local.save(blob);

    try {
      await this.remote.save(blob);
    } catch (error) {
      // リモート同期の失敗は実行を止めない
      logger.warn("Failed to sync optimizer state to remote store", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
