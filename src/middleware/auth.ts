/**
 * マージン最適化エンジン - 認証ミドルウェア
 */

import { Request, Response, NextFunction } from "express";
import { logger } from "../logger";

/**
 * 認証エラーレスポンス
 */
interface AuthErrorResponse {
  error: string;
  message: string;
}

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 */
export function apiKeyAuth(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      // API Keyが設定されていない場合は認証をスキップ
      logger.warn("API Key authentication is disabled (CRON_API_KEY not set)");
      next();
      return;
    }

    const providedKey = req.header("x-api-key") || extractBearerToken(req.header("authorization"));

    if (!providedKey) {
      const response: AuthErrorResponse = {
        error: "Unauthorized",
        message: "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>",
      };
      res.status(401).json(response);
      return;
    }

    if (providedKey !== apiKey) {
      logger.warn("Invalid API key attempt", {
        ip: req.ip,
        path: req.path,
      });
      const response: AuthErrorResponse = {
        error: "Unauthorized",
        message: "Invalid API key",
      };
      res.status(401).json(response);
      return;
    }

    next();
  };
}

/**
 * Authorization ヘッダーからBearerトークンを抽出
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.substring(7);
}
