import { EventEmitter } from "node:events";
import fsp from "node:fs/promises";
import { loadConfig } from "../config";
import { runDaemon } from "../daemon";
import { captureLogger, mkCase, mkTmp, waitFor } from "./util";

describe("runDaemon", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp();
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test.each(["SIGINT", "SIGTERM"] as const)(
    "%s stops the loop and detaches the handlers",
    async (sig) => {
      const dirs = await mkCase(tmp, sig);
      const config = loadConfig({
        HOTFOLDER_INPUT_DIR: dirs.input,
        HOTFOLDER_OUTPUT_DIR: dirs.output,
        HOTFOLDER_POLL_INTERVAL_S: "0.1",
      });
      const signals = new EventEmitter();
      const { logger, entries } = captureLogger();

      const running = runDaemon(config, { logger, signals });
      await waitFor(() => entries.some((e) => e.message === "watching"));
      expect(signals.listenerCount("SIGINT")).toBe(1);
      expect(signals.listenerCount("SIGTERM")).toBe(1);

      signals.emit(sig, sig);
      await running;

      const requested = entries.find((e) => e.message === "shutdown requested");
      expect(requested?.meta).toEqual({ signal: sig });
      expect(entries[entries.length - 1].message).toBe("stopped");
      expect(signals.listenerCount("SIGINT")).toBe(0);
      expect(signals.listenerCount("SIGTERM")).toBe(0);
    },
  );

  test("an external signal replaces the process handlers", async () => {
    const dirs = await mkCase(tmp, "external");
    const config = loadConfig({
      HOTFOLDER_INPUT_DIR: dirs.input,
      HOTFOLDER_OUTPUT_DIR: dirs.output,
    });
    const signals = new EventEmitter();
    const controller = new AbortController();
    controller.abort();
    await runDaemon(config, { signal: controller.signal, signals });
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });
});
