import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import open from "open";
import { readWorktreePatch } from "../../core/git/patchSource.js";
import { pairHunks } from "../../core/pairing/pairBuilder.js";
import { readPatchHunks } from "../../core/pairing/patch.js";
import { pairTexts } from "../../core/pairing/textPairing.js";
import { paintRibbon, planRibbons } from "../../core/ribbons/renderer.js";
import { SvgSurface } from "../../core/ribbons/svgSurface.js";
import { resolvePalette, type ThemeName } from "../../core/ribbons/theme.js";
import type { DiffPairWithConnection, RibbonMode } from "../../core/ribbons/types.js";

export type RenderSource =
  | { type: "patch"; patchFile: string; path?: string }
  | { type: "files"; oldFile: string; newFile: string }
  | { type: "worktree"; repoPath: string; path?: string; stagedOnly: boolean };

export interface RunRenderOptions {
  source: RenderSource;
  outPath: string;
  lineHeight: number;
  width: number;
  style: RibbonMode;
  theme: ThemeName;
  background?: string;
  openResult: boolean;
}

export interface RenderResult {
  outPath: string;
  filePath: string | null;
  pairCount: number;
  ribbonCount: number;
}

const loadPairs = async (
  source: RenderSource,
): Promise<{ filePath: string | null; pairs: DiffPairWithConnection[] }> => {
  switch (source.type) {
    case "patch": {
      const diffText = await readFile(resolve(source.patchFile), "utf8");
      const { path, hunks } = readPatchHunks(diffText, source.path);
      return { filePath: path, pairs: pairHunks(hunks) };
    }
    case "worktree": {
      const diffText = await readWorktreePatch({
        repoPath: resolve(source.repoPath),
        path: source.path,
        stagedOnly: source.stagedOnly,
      });
      // git resolves the pathspec from repoPath but prints root-relative paths.
      const { path, hunks } = readPatchHunks(diffText);
      return { filePath: path, pairs: pairHunks(hunks) };
    }
    case "files": {
      const [oldText, newText] = await Promise.all([
        readFile(resolve(source.oldFile), "utf8"),
        readFile(resolve(source.newFile), "utf8"),
      ]);
      return { filePath: null, pairs: pairTexts(oldText, newText) };
    }
  }
};

export const runRender = async (options: RunRenderOptions): Promise<RenderResult> => {
  const { filePath, pairs } = await loadPairs(options.source);
  const plan = planRibbons(pairs, {
    lineHeight: options.lineHeight,
    viewWidth: options.width,
    isFluidMode: options.style === "fluid",
    palette: resolvePalette(options.theme),
  });

  const surface = new SvgSurface();
  for (const ribbon of plan.ribbons) {
    paintRibbon(surface, ribbon);
  }

  const outPath = resolve(options.outPath);
  await writeFile(
    outPath,
    surface.toDocument({ width: options.width, height: plan.contentHeight, background: options.background }),
    "utf8",
  );

  if (options.openResult) {
    await open(outPath);
  }

  return { outPath, filePath, pairCount: pairs.length, ribbonCount: plan.ribbons.length };
};
