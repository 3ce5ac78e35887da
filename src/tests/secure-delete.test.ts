import fsp from "node:fs/promises";
import { join } from "node:path";
import {
  deletionStrategy,
  PlainDeletion,
  ShredDeletion,
} from "../secure-delete";
import { captureLogger, fileExists, mkTmp } from "./util";

describe("deletion strategies", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp();
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  const makeFile = async (name: string) => {
    const p = join(tmp, name);
    await fsp.writeFile(p, "payload");
    return p;
  };

  test("plain deletion unlinks", async () => {
    const p = await makeFile("plain.mov");
    expect(await new PlainDeletion().delete(p)).toEqual({
      path: p,
      method: "unlink",
    });
    expect(await fileExists(p)).toBe(false);
  });

  test("deleting a file that is already gone is not an error", async () => {
    const p = join(tmp, "never-existed.mov");
    expect(await new PlainDeletion().delete(p)).toEqual({
      path: p,
      method: "missing",
    });
    expect(await new ShredDeletion().delete(p)).toEqual({
      path: p,
      method: "missing",
    });
  });

  test("falls back to unlink when the shred command is unavailable", async () => {
    const p = await makeFile("noshred.mov");
    const { logger, entries } = captureLogger();
    const strategy = new ShredDeletion(logger, join(tmp, "no-such-shred"));
    expect(await strategy.delete(p)).toEqual({
      path: p,
      method: "unlink-fallback",
    });
    expect(await fileExists(p)).toBe(false);
    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ["warn", "secure delete failed; falling back to unlink"],
    ]);
  });

  test("falls back when the command fails", async () => {
    const p = await makeFile("failing.mov");
    const strategy = new ShredDeletion(undefined, "false");
    expect(await strategy.delete(p)).toEqual({
      path: p,
      method: "unlink-fallback",
    });
  });

  test("falls back when the command leaves the file behind", async () => {
    const p = await makeFile("survivor.mov");
    const strategy = new ShredDeletion(undefined, "true");
    expect(await strategy.delete(p)).toEqual({
      path: p,
      method: "unlink-fallback",
    });
    expect(await fileExists(p)).toBe(false);
  });

  test("deletionStrategy picks by flag", () => {
    expect(deletionStrategy(false).name).toBe("plain");
    expect(deletionStrategy(true).name).toBe("shred");
  });
});
