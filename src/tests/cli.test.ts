import { resolve } from "node:path";
import { buildProgram } from "../cli";
import { parseAndRun } from "../cli-util";
import { ConfigError } from "../errors";

describe("hotfolder config", () => {
  const run = async (argv: string[], env: NodeJS.ProcessEnv = {}) => {
    const out: string[] = [];
    await parseAndRun(
      () => buildProgram({ env, cwd: "/srv", write: (t) => out.push(t) }),
      argv,
    );
    return JSON.parse(out.join(""));
  };

  test("prints the effective configuration", async () => {
    const cfg = await run(["config"]);
    expect(cfg).toMatchObject({
      apiUrl: "http://localhost:8001/api",
      inputDir: resolve("/srv", "hotfolder/input"),
      maxConcurrentJobs: 5,
      pollIntervalS: 5,
      logLevel: "info",
    });
  });

  test("flags override environment variables", async () => {
    const cfg = await run(
      [
        "--log-level",
        "debug",
        "config",
        "-j",
        "2",
        "--input-dir",
        "drop",
        "-i",
        "*.tmp",
        "-i",
        "*.bak,*.old",
        "--secure-delete",
      ],
      { HOTFOLDER_MAX_CONCURRENT_JOBS: "7", HOTFOLDER_LOG_LEVEL: "error" },
    );
    expect(cfg).toMatchObject({
      inputDir: "/srv/drop",
      maxConcurrentJobs: 2,
      secureDelete: true,
      ignore: ["*.tmp", "*.bak", "*.old"],
      logLevel: "debug",
    });
  });

  test("invalid values surface as ConfigError", async () => {
    await expect(
      run(["config", "--poll-interval", "0"]),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
