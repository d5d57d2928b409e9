/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";
import { getAllCircuitBreakerStatuses } from "../utils/retry";

const router = Router();

// ルート一覧
router.get("/", (_req: Request, res: Response) => {
  res.json({
    message: "Margin Optimizer API",
    version: "1.0.0",
    endpoints: {
      health: "GET /health",
      cron_run_optimizer: "POST /cron/run-optimizer",
    },
  });
});

// ヘルスチェック
router.get("/health", (_req: Request, res: Response) => {
  const circuitBreakers = getAllCircuitBreakerStatuses();
  const cbStatus: Record<string, { state: string; failures: number }> = {};

  circuitBreakers.forEach((status, name) => {
    cbStatus[name] = status;
  });

  const hasOpenCircuit = Array.from(circuitBreakers.values()).some(
    (cb) => cb.state === "OPEN"
  );

  res.status(hasOpenCircuit ? 503 : 200).json({
    status: hasOpenCircuit ? "degraded" : "healthy",
    timestamp: new Date().toISOString(),
    circuitBreakers: cbStatus,
  });
});

export default router;
