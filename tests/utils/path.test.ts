import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ensureDir, isDirectory, resolveFrom } from "../../src/utils/path";

describe("path utilities", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "hookvault-path-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  test("ensureDir creates nested directories and tolerates existing ones", async () => {
    const nested = path.join(workDir, "a", "b", "c");

    await ensureDir(nested);
    await ensureDir(nested);

    expect(await isDirectory(nested)).toBe(true);
  });

  test("isDirectory is false for files and missing paths", async () => {
    const file = path.join(workDir, "file.txt");
    await writeFile(file, "x");

    expect(await isDirectory(file)).toBe(false);
    expect(await isDirectory(path.join(workDir, "missing"))).toBe(false);
  });

  test("resolveFrom keeps absolute paths", () => {
    expect(resolveFrom("/etc/hookvault", "/srv/data")).toBe("/srv/data");
  });

  test("resolveFrom resolves relative paths against the base", () => {
    expect(resolveFrom("/etc/hookvault", "./backups")).toBe("/etc/hookvault/backups");
    expect(resolveFrom("/etc/hookvault", "../data")).toBe("/etc/data");
  });
});
