/**
 * HTTPエンドポイントのテスト（プロセス内でサーバーを起動）
 */

import { Server } from "http";
import { AppConfig, loadConfig } from "../../src/config";
import { PerformanceWindow } from "../../src/metrics";
import { MarginOptimizer } from "../../src/optimizer/margin-optimizer";
import { OptimizerTickDeps } from "../../src/runner/optimizer-runner";
import { createApp } from "../../src/server";
import { TickDepsFactory } from "../../src/routes";
import { MemoryStateStore } from "../helpers/memory-state-store";

const WINDOW: PerformanceWindow = {
  margin: 35,
  impressions: 55000,
  revenue: 25.0,
  cost: 16.0,
  bidRate: 1.5,
  responses: 28000,
};

async function makeDeps(updateOk: boolean = true): Promise<OptimizerTickDeps> {
  return {
    source: { name: "fixed", fetchWindow: async () => ({ ...WINDOW }) },
    optimizer: await MarginOptimizer.create({ store: new MemoryStateStore() }),
    marginSink: { updateMargin: async () => updateOk },
  };
}

async function listen(config: AppConfig, createDeps: TickDepsFactory): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp(config, createDeps);
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server has no TCP address");
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

describe("HTTP API", () => {
  let server: Server | undefined;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    if (server) {
      await close(server);
      server = undefined;
    }
    jest.restoreAllMocks();
  });

  describe("GET /health", () => {
    it("ヘルスチェックを返す", async () => {
      const started = await listen(loadConfig({}), () => makeDeps());
      server = started.server;

      const response = await fetch(`${started.baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: "healthy" });
    });

    it("ルート一覧を返す", async () => {
      const started = await listen(loadConfig({}), () => makeDeps());
      server = started.server;

      const body = await (await fetch(`${started.baseUrl}/`)).json();

      expect(body).toMatchObject({
        message: "Margin Optimizer API",
        endpoints: { health: "GET /health", cron_run_optimizer: "POST /cron/run-optimizer" },
      });
    });
  });

  describe("POST /cron/run-optimizer", () => {
    it("1ティック実行して結果を返す", async () => {
      const started = await listen(loadConfig({}), () => makeDeps());
      server = started.server;

      const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, { method: "POST" });
      const body = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({
        success: true,
        statusCode: 200,
        data: {
          currentMargin: 35,
          nextMargin: 36,
          transition: "COLD_START",
          success: true,
        },
      });
    });

    it("マージン適用に失敗したら 502", async () => {
      const started = await listen(loadConfig({}), () => makeDeps(false));
      server = started.server;

      const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, { method: "POST" });
      const body = await response.json();

      expect(response.status).toBe(502);
      expect(body).toMatchObject({ statusCode: 502, data: { success: false } });
    });

    it("依存関係の構築に失敗したらエラーレスポンス", async () => {
      const started = await listen(loadConfig({}), () => Promise.reject(new Error("store unavailable")));
      server = started.server;

      const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, { method: "POST" });
      const body = await response.json();

      expect(response.status).toBe(500);
      expect(body).toMatchObject({
        success: false,
        error: { code: "INTERNAL_ERROR", message: "store unavailable" },
      });

      const failures = jest
        .mocked(console.error)
        .mock.calls.map((call) => JSON.parse(String(call[0])))
        .filter((entry) => entry.message === "Optimizer cron run failed");
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({
        level: "error",
        code: "INTERNAL_ERROR",
        retryable: false,
        error: "store unavailable",
      });
    });

    it("実行中の再実行は 409", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let entered: () => void = () => undefined;
      const started = new Promise<void>((resolve) => {
        entered = resolve;
      });

      const running = await listen(loadConfig({}), async () => {
        entered();
        await gate;
        return makeDeps();
      });
      server = running.server;

      const first = fetch(`${running.baseUrl}/cron/run-optimizer`, { method: "POST" });
      await started;

      const second = await fetch(`${running.baseUrl}/cron/run-optimizer`, { method: "POST" });
      expect(second.status).toBe(409);
      expect(await second.json()).toMatchObject({ statusCode: 409, error: { code: "CONFLICT" } });

      release();
      expect((await first).status).toBe(200);
    });

    describe("CRON_API_KEY 設定時", () => {
      const config = loadConfig({ CRON_API_KEY: "test-secret", API_KEY: "platform-secret" });

      it("キーが無ければ 401", async () => {
        const started = await listen(config, () => makeDeps());
        server = started.server;

        const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, { method: "POST" });

        expect(response.status).toBe(401);
        expect(await response.json()).toMatchObject({ error: "Unauthorized" });
      });

      it("キーが違えば 401", async () => {
        const started = await listen(config, () => makeDeps());
        server = started.server;

        const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, {
          method: "POST",
          headers: { "X-API-Key": "wrong-key" },
        });

        expect(response.status).toBe(401);
        expect(await response.json()).toEqual({ error: "Unauthorized", message: "Invalid API key" });
      });

      it("外部API用の API_KEY では認証できない", async () => {
        const started = await listen(config, () => makeDeps());
        server = started.server;

        const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, {
          method: "POST",
          headers: { Authorization: "Bearer platform-secret" },
        });

        expect(response.status).toBe(401);
      });

      it("X-API-Key ヘッダーで認証", async () => {
        const started = await listen(config, () => makeDeps());
        server = started.server;

        const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, {
          method: "POST",
          headers: { "X-API-Key": "test-secret" },
        });

        expect(response.status).toBe(200);
      });

      it("Bearer トークンで認証", async () => {
        const started = await listen(config, () => makeDeps());
        server = started.server;

        const response = await fetch(`${started.baseUrl}/cron/run-optimizer`, {
          method: "POST",
          headers: { Authorization: "Bearer test-secret" },
        });

        expect(response.status).toBe(200);
      });
    });
  });
});
