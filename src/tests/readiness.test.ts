import fsp from "node:fs/promises";
import { join } from "node:path";
import { ReadinessDetector, type FileObservation } from "../readiness";
import { mkTmp } from "./util";

const obs = (path: string, size: number, mtimeMs: number): FileObservation => ({
  path,
  size,
  mtimeMs,
});

describe("ReadinessDetector.observe", () => {
  const make = (minAgeMs = 4000) =>
    new ReadinessDetector({ root: "/in", minAgeMs });

  test("first sighting is never ready", () => {
    const d = make();
    const r = d.observe([obs("/in/a.mov", 10, 1000)], 100_000);
    expect(r.ready).toEqual([]);
    expect(r.files[0].readiness).toBe("unstable");
  });

  test("two identical snapshots past the minimum age are ready", () => {
    const d = make();
    d.observe([obs("/in/a.mov", 10, 1000)], 5000);
    const r = d.observe([obs("/in/a.mov", 10, 1000)], 10_000);
    expect(r.ready).toEqual(["/in/a.mov"]);
  });

  test("identical snapshots younger than the minimum age are not ready", () => {
    const d = make();
    d.observe([obs("/in/a.mov", 10, 8000)], 9000);
    const r = d.observe([obs("/in/a.mov", 10, 8000)], 11_999);
    expect(r.ready).toEqual([]);
    // exactly at the boundary counts as old enough
    const r2 = d.observe([obs("/in/a.mov", 10, 8000)], 12_000);
    expect(r2.ready).toEqual(["/in/a.mov"]);
  });

  test("a growing file restarts the count", () => {
    const d = make(0);
    d.observe([obs("/in/a.mov", 10, 1000)], 2000);
    expect(d.observe([obs("/in/a.mov", 20, 1000)], 3000).ready).toEqual([]);
    expect(d.observe([obs("/in/a.mov", 20, 1000)], 4000).ready).toEqual([
      "/in/a.mov",
    ]);
  });

  test("an mtime that moved backwards is a change", () => {
    const d = make(0);
    d.observe([obs("/in/a.mov", 10, 5000)], 6000);
    expect(d.observe([obs("/in/a.mov", 10, 4000)], 7000).ready).toEqual([]);
    expect(d.observe([obs("/in/a.mov", 10, 4000)], 8000).ready).toEqual([
      "/in/a.mov",
    ]);
  });

  test("claimed paths are reported as claimed, not ready", () => {
    const d = make(0);
    d.observe([obs("/in/a.mov", 10, 1000)], 2000);
    const r = d.observe(
      [obs("/in/a.mov", 10, 1000)],
      3000,
      (p) => p === "/in/a.mov",
    );
    expect(r.ready).toEqual([]);
    expect(r.files[0].readiness).toBe("claimed");
  });

  test("vanished paths are reported and forgotten", () => {
    const d = make(0);
    d.observe([obs("/in/a.mov", 10, 1000), obs("/in/b.mov", 5, 1000)], 2000);
    const r = d.observe([obs("/in/b.mov", 5, 1000)], 3000);
    expect(r.vanished).toEqual(["/in/a.mov"]);
    expect(d.tracked).toBe(1);
    // a file that comes back starts over
    const back = d.observe(
      [obs("/in/a.mov", 10, 1000), obs("/in/b.mov", 5, 1000)],
      4000,
    );
    expect(back.ready).toEqual(["/in/b.mov"]);
  });
});

describe("ReadinessDetector.list", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp();
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("only regular, visible, non-ignored files are candidates", async () => {
    await fsp.writeFile(join(tmp, "clip.mov"), "x".repeat(12));
    await fsp.writeFile(join(tmp, ".hidden.mov"), "x");
    await fsp.writeFile(join(tmp, "clip.mov.part"), "x");
    await fsp.writeFile(join(tmp, "Thumbs.db"), "x");
    await fsp.mkdir(join(tmp, "subdir"));
    await fsp.symlink(join(tmp, "clip.mov"), join(tmp, "link.mov"));

    const d = new ReadinessDetector({
      root: tmp,
      minAgeMs: 0,
      ignoreRules: ["*.part", "Thumbs.db"],
    });
    const listed = await d.list();
    expect(listed.map((f) => f.path)).toEqual([join(tmp, "clip.mov")]);
    expect(listed[0].size).toBe(12);
  });

  test("scan marks an untouched file ready on the second pass", async () => {
    const dir = join(tmp, "scan");
    await fsp.mkdir(dir);
    const file = join(dir, "movie.mkv");
    await fsp.writeFile(file, "data");
    const old = new Date(Date.now() - 60_000);
    await fsp.utimes(file, old, old);

    const d = new ReadinessDetector({ root: dir, minAgeMs: 4000 });
    expect((await d.scan(Date.now())).ready).toEqual([]);
    expect((await d.scan(Date.now())).ready).toEqual([file]);
  });

  test("a missing input directory is an error for the caller", async () => {
    const d = new ReadinessDetector({
      root: join(tmp, "does-not-exist"),
      minAgeMs: 0,
    });
    await expect(d.list()).rejects.toMatchObject({ code: "ENOENT" });
  });
});
