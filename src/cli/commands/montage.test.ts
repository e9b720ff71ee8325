import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { expandInputs } from "./montage";

describe("expandInputs", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "gmwrap-montage-"));
    for (const name of ["b.png", "a.png", "notes.txt"]) {
      await writeFile(join(dir, name), "");
    }
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("expands patterns to sorted files", async () => {
    expect(await expandInputs(["*.png"], dir)).toEqual(["a.png", "b.png"]);
  });

  it("lists a file matched by two patterns once", async () => {
    expect(await expandInputs(["a.*", "*.png"], dir)).toEqual(["a.png", "b.png"]);
  });
});
