import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runRender } from "../src/cli/commands/render.js";

describe("runRender", () => {
  let workDir = "";

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "diff-ribbons-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("renders two files to an SVG sized to the rows", async () => {
    const oldFile = join(workDir, "old.txt");
    const newFile = join(workDir, "new.txt");
    const outPath = join(workDir, "out.svg");
    await writeFile(oldFile, "a\nb\n", "utf8");
    await writeFile(newFile, "a\nc\nd\n", "utf8");

    const result = await runRender({
      source: { type: "files", oldFile, newFile },
      outPath,
      lineHeight: 20,
      width: 400,
      style: "blocks",
      theme: "light",
      openResult: false,
    });

    expect(result).toEqual({ outPath, filePath: null, pairCount: 3, ribbonCount: 2 });
    const svg = await readFile(outPath, "utf8");
    expect(svg.split("\n")[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="400" height="60" viewBox="0 0 400 60">');
    expect(svg).toContain('<path d="M170 20 L230 20 L230 40 L170 40 Z" fill="url(#ribbon-gradient-1)"/>');
    expect(svg).toContain('stop-color="#0284c7"');
    expect(svg).toContain('stop-color="#16a34a"');
  });

  it("renders the hunks of a patch file", async () => {
    const patchFile = join(workDir, "change.diff");
    const outPath = join(workDir, "patch.svg");
    await writeFile(
      patchFile,
      [
        "diff --git a/notes.md b/notes.md",
        "index 1111111..2222222 100644",
        "--- a/notes.md",
        "+++ b/notes.md",
        "@@ -1,2 +1,2 @@",
        " title",
        "-draft",
        "+final",
        "",
      ].join("\n"),
      "utf8",
    );

    const result = await runRender({
      source: { type: "patch", patchFile },
      outPath,
      lineHeight: 22,
      width: 800,
      style: "fluid",
      theme: "dark",
      background: "#0f172a",
      openResult: false,
    });

    expect(result).toEqual({ outPath, filePath: "notes.md", pairCount: 3, ribbonCount: 1 });
    const svg = await readFile(outPath, "utf8");
    expect(svg).toContain('<rect width="100%" height="100%" fill="#0f172a"/>');
    expect(svg).toContain('<path d="M370 44 C400 44 400 44 430 44 L430 66 C400 66 400 66 370 66 Z" fill="url(#ribbon-gradient-1)"/>');
  });
});
