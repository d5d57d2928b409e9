/**
 * Cronジョブエンドポイント
 *
 * スケジューラから1ティックごとに呼ばれる。
 * 同一プロセス内では同時に1つの実行しか受け付けない。
 */

import { Router, Request, Response } from "express";
import { AppConfig } from "../config";
import { ApiResponseBuilder, AppError, ErrorCode, toAppError } from "../errors";
import { logger } from "../logger";
import {
  createOptimizerTickDeps,
  OptimizerTickDeps,
  runOptimizerTick,
} from "../runner/optimizer-runner";

export type TickDepsFactory = (config: AppConfig) => Promise<OptimizerTickDeps>;

export function createCronRoutes(
  config: AppConfig,
  createDeps: TickDepsFactory = createOptimizerTickDeps
): Router {
  const router = Router();
  let running = false;

  router.post("/run-optimizer", async (_req: Request, res: Response) => {
    if (running) {
      const body = ApiResponseBuilder.error(
        new AppError({
          code: ErrorCode.CONFLICT,
          message: "Optimizer run already in progress",
          statusCode: 409,
        })
      );
      res.status(409).json(body);
      return;
    }

    running = true;
    try {
      const deps = await createDeps(config);
      const result = await runOptimizerTick(deps);
      res.status(result.success ? 200 : 502).json(
        ApiResponseBuilder.success(result, result.success ? 200 : 502)
      );
    } catch (error) {
      const appError = toAppError(error);
      logger.error("Optimizer cron run failed", {
        code: appError.code,
        retryable: appError.retryable,
        error: appError.message,
      });
      const body = ApiResponseBuilder.error(appError);
      res.status(body.statusCode).json(body);
    } finally {
      running = false;
    }
  });

  return router;
}
