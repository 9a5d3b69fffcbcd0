import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findExecutable } from "../../src/util/path.js";

describe("findExecutable", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "dotwrap-path-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("finds an executable file on PATH", async () => {
    await writeFile(join(tempDir, "gh"), "#!/bin/sh\n", { mode: 0o755 });
    await expect(findExecutable("gh", { PATH: tempDir }, "linux")).resolves.toBe(
      join(tempDir, "gh"),
    );
  });

  it("returns undefined when the command is absent", async () => {
    await expect(findExecutable("gh", { PATH: tempDir }, "linux")).resolves.toBeUndefined();
  });

  it("skips files without an execute bit", async () => {
    await writeFile(join(tempDir, "gh"), "not a program\n", { mode: 0o644 });
    await expect(findExecutable("gh", { PATH: tempDir }, "linux")).resolves.toBeUndefined();
  });

  it("skips directories with the command's name", async () => {
    await mkdir(join(tempDir, "gh"));
    await expect(findExecutable("gh", { PATH: tempDir }, "linux")).resolves.toBeUndefined();
  });

  it("returns undefined without PATH or command", async () => {
    await expect(findExecutable("gh", {}, "linux")).resolves.toBeUndefined();
    await expect(findExecutable("", { PATH: tempDir }, "linux")).resolves.toBeUndefined();
  });

  it("tries PATHEXT extensions on Windows", async () => {
    await writeFile(join(tempDir, "gh.cmd"), "@echo off\r\n");
    await expect(
      findExecutable("gh", { PATH: tempDir, PATHEXT: ".EXE;.CMD" }, "win32"),
    ).resolves.toBe(join(tempDir, "gh.cmd"));
  });
});
