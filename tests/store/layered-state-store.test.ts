/**
 * ローカル優先 + リモートフォールバックの状態ストアのテスト
 */

import { logger } from "../../src/logger";
import { LayeredStateStore } from "../../src/store/layered-state-store";
import { MemoryStateStore } from "../helpers/memory-state-store";

describe("LayeredStateStore", () => {
  beforeEach(() => {
    jest.spyOn(logger, "info").mockImplementation(() => undefined);
    jest.spyOn(logger, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("load", () => {
    it("ローカルにあればリモートは読まない", async () => {
      const local = new MemoryStateStore("local-blob");
      const remote = new MemoryStateStore("remote-blob", "remote");
      const store = new LayeredStateStore(local, remote);

      await expect(store.load()).resolves.toBe("local-blob");
      expect(remote.loadCalls).toBe(0);
    });

    it("ローカルの内容が壊れていてもローカルを返す", async () => {
      const remote = new MemoryStateStore("remote-blob", "remote");
      const store = new LayeredStateStore(new MemoryStateStore("{broken"), remote);

      await expect(store.load()).resolves.toBe("{broken");
      expect(remote.loadCalls).toBe(0);
    });

    it("ローカルに無ければリモートから読む", async () => {
      const remote = new MemoryStateStore("remote-blob", "remote");
      const store = new LayeredStateStore(new MemoryStateStore(), remote);

      await expect(store.load()).resolves.toBe("remote-blob");
      expect(remote.loadCalls).toBe(1);
    });

    it("どちらにも無ければ null", async () => {
      const store = new LayeredStateStore(new MemoryStateStore(), new MemoryStateStore(null, "remote"));

      await expect(store.load()).resolves.toBeNull();
    });

    it("リモートの読み込みエラーは警告して null", async () => {
      const remote = new MemoryStateStore(null, "remote");
      jest.spyOn(remote, "load").mockRejectedValue(new Error("network down"));
      const store = new LayeredStateStore(new MemoryStateStore(), remote);

      await expect(store.load()).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith("Failed to load optimizer state from remote store", {
        error: "network down",
      });
    });

    it("ローカルの読み込みエラーはそのまま投げる", async () => {
      const local = new MemoryStateStore();
      jest.spyOn(local, "load").mockRejectedValue(new Error("EACCES"));
      const store = new LayeredStateStore(local, new MemoryStateStore(null, "remote"));

      await expect(store.load()).rejects.toThrow("EACCES");
    });
  });

  describe("save", () => {
    it("ローカルとリモートの両方に書き込む", async () => {
      const local = new MemoryStateStore();
      const remote = new MemoryStateStore(null, "remote");
      const store = new LayeredStateStore(local, remote);

      await store.save("blob");

      expect(local.saves).toEqual(["blob"]);
      expect(remote.saves).toEqual(["blob"]);
    });

    it("リモートの書き込みエラーは警告のみ", async () => {
      const local = new MemoryStateStore();
      const remote = new MemoryStateStore(null, "remote");
      jest.spyOn(remote, "save").mockRejectedValue(new Error("quota exceeded"));
      const store = new LayeredStateStore(local, remote);

      await expect(store.save("blob")).resolves.toBeUndefined();
      expect(local.saves).toEqual(["blob"]);
      expect(logger.warn).toHaveBeenCalledWith("Failed to sync optimizer state to remote store", {
        error: "quota exceeded",
      });
    });

    it("ローカルの書き込みエラーは投げ、リモートには書かない", async () => {
      const local = new MemoryStateStore();
      jest.spyOn(local, "save").mockRejectedValue(new Error("disk full"));
      const remote = new MemoryStateStore(null, "remote");
      const store = new LayeredStateStore(local, remote);

      await expect(store.save("blob")).rejects.toThrow("disk full");
      expect(remote.saves).toEqual([]);
    });
  });

  it("種類は local-with-remote", () => {
    const store = new LayeredStateStore(new MemoryStateStore(), new MemoryStateStore(null, "remote"));

    expect(store.kind).toBe("local-with-remote");
  });
});
