import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { FileSystemModuleLoader, isScannableModule } from "./module_loader.ts";
import { createTempDir, removeTempDir } from "../../test/test_helpers.ts";

let tempDir: string;

beforeEach(async () => {
  tempDir = await createTempDir();
});

afterEach(async () => {
  await removeTempDir(tempDir);
});

test("isScannableModule accepts source modules", () => {
  expect(isScannableModule("users.ts")).toBe(true);
  expect(isScannableModule("users.mts")).toBe(true);
  expect(isScannableModule("users.js")).toBe(true);
  expect(isScannableModule("users.mjs")).toBe(true);
});

test("isScannableModule skips declarations, tests and other files", () => {
  expect(isScannableModule("users.d.ts")).toBe(false);
  expect(isScannableModule("users_test.ts")).toBe(false);
  expect(isScannableModule("users.test.js")).toBe(false);
  expect(isScannableModule("users.spec.ts")).toBe(false);
  expect(isScannableModule("README.md")).toBe(false);
});

test("FileSystemModuleLoader.listModules walks the tree in sorted order", async () => {
  await mkdir(join(tempDir, "nested"));
  await writeFile(join(tempDir, "b.ts"), "");
  await writeFile(join(tempDir, "a.ts"), "");
  await writeFile(join(tempDir, "a_test.ts"), "");
  await writeFile(join(tempDir, "notes.md"), "");
  await writeFile(join(tempDir, "nested", "c.mjs"), "");

  const modules = await new FileSystemModuleLoader().listModules(tempDir);

  expect(modules).toEqual([
    join(tempDir, "a.ts"),
    join(tempDir, "b.ts"),
    join(tempDir, "nested", "c.mjs"),
  ]);
});

test("FileSystemModuleLoader.listModules fails for a missing root", async () => {
  const loader = new FileSystemModuleLoader();

  await expect(loader.listModules(join(tempDir, "missing"))).rejects.toThrow();
});
