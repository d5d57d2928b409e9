/**
 * マージン最適化エンジン - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import express, { Express } from "express";
import { AppConfig, loadConfig } from "./config";
import { logger } from "./logger";
import { apiKeyAuth } from "./middleware/auth";
import { createCronRoutes, healthRoutes, TickDepsFactory } from "./routes";

// =============================================================================
// アプリケーション生成
// =============================================================================

/**
 * Express app を作成
 */
export function createApp(config: AppConfig, createDeps?: TickDepsFactory): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(logger.requestLogger());

  app.use("/", healthRoutes);
  app.use("/cron", apiKeyAuth(config.cronApiKey), createCronRoutes(config, createDeps));

  return app;
}

// =============================================================================
// サーバー起動関数
// =============================================================================

/**
 * HTTPサーバーを起動する
 *
 * @returns Promise<void> - サーバー起動完了後にresolve（プロセスは終了しない）
 */
export async function startServer(): Promise<void> {
  const config = loadConfig();
  const app = createApp(config);

  await new Promise<void>((resolve) => {
    app.listen(config.port, () => {
      logger.info("Margin optimizer server started", {
        port: config.port,
        environment: config.nodeEnv,
        armId: config.armId,
        remoteStoreEnabled: config.remoteStoreEnabled,
      });
      resolve();
    });
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error("Failed to start server", { error });
    process.exit(1);
  });
}
