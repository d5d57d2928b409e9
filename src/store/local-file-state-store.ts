/**
 * ローカルファイル状態ストア
 */

import { promises as fs } from "fs";
import * as path from "path";
import { logger } from "../logger";
import { StateStore } from "./types";

function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class LocalFileStateStore implements StateStore {
  readonly kind = "local" as const;

  constructor(private readonly filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  /**
   * ファイルが無ければ null。それ以外の読み込みエラーはそのまま投げる
   */
  async load(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug("Local optimizer state not found", { path: this.filePath });
        return null;
      }
      throw error;
    }
  }

  async save(blob: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, blob, "utf-8");
  }
}
