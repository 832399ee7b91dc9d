import { Command, InvalidArgumentError } from "commander";
import { isThemeName, type ThemeName } from "../core/ribbons/theme.js";
import type { RibbonMode } from "../core/ribbons/types.js";
import { runRender, type RenderResult, type RenderSource } from "./commands/render.js";

const parsePositive = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive number, got "${value}".`);
  }
  return parsed;
};

const parseStyle = (value: string): RibbonMode => {
  if (value === "fluid" || value === "blocks") return value;
  throw new InvalidArgumentError(`Expected "fluid" or "blocks", got "${value}".`);
};

const parseTheme = (value: string): ThemeName => {
  if (isThemeName(value)) return value;
  throw new InvalidArgumentError(`Expected "dark" or "light", got "${value}".`);
};

export const defaultTheme = (env: NodeJS.ProcessEnv): ThemeName => {
  const fromEnv = env.RIBBONS_THEME;
  if (fromEnv === undefined || fromEnv.length === 0) return "dark";
  if (isThemeName(fromEnv)) return fromEnv;
  console.warn(`Ignoring RIBBONS_THEME="${fromEnv}"; using "dark".`);
  return "dark";
};

interface OutputOptions {
  out: string;
  lineHeight: number;
  width: number;
  style: RibbonMode;
  theme: ThemeName;
  background?: string;
  open: boolean;
}

const withOutputOptions = (command: Command, theme: ThemeName): Command =>
  command
    .option("--out <file>", "SVG file to write", "ribbons.svg")
    .option("--line-height <px>", "Row height", parsePositive, 22)
    .option("--width <px>", "Overlay width", parsePositive, 800)
    .option("--style <style>", "Ribbon style: fluid or blocks", parseStyle, "fluid")
    .option("--theme <theme>", "Palette: dark or light", parseTheme, theme)
    .option("--background <color>", "Background fill behind the ribbons")
    .option("--open", "Open the SVG when done", false);

const render = async (source: RenderSource, options: OutputOptions): Promise<RenderResult> => {
  const result = await runRender({
    source,
    outPath: options.out,
    lineHeight: options.lineHeight,
    width: options.width,
    style: options.style,
    theme: options.theme,
    background: options.background,
    openResult: options.open,
  });
  const label = result.filePath ?? "files";
  console.log(`Rendered ${result.ribbonCount} ribbons over ${result.pairCount} rows (${label}) to ${result.outPath}`);
  return result;
};

/** Builds the CLI; the theme default is resolved once and shared by every command. */
export const createProgram = (version: string, env: NodeJS.ProcessEnv = process.env): Command => {
  const theme = defaultTheme(env);
  const program = new Command();
  program.name("diff-ribbons").description("Render diff connection ribbons to SVG").version(version);

  withOutputOptions(
    program
      .command("render")
      .description("Render ribbons for a patch file or for two files")
      .option("--patch <file>", "Unified diff to read")
      .option("--path <file>", "File inside the patch (default: first with text hunks)")
      .option("--old <file>", "Old side when comparing two files")
      .option("--new <file>", "New side when comparing two files"),
    theme,
  ).action(async (options: OutputOptions & { patch?: string; path?: string; old?: string; new?: string }) => {
    if (options.patch) {
      await render({ type: "patch", patchFile: options.patch, path: options.path }, options);
      return;
    }
    if (options.old && options.new) {
      await render({ type: "files", oldFile: options.old, newFile: options.new }, options);
      return;
    }
    throw new Error("Use `render --patch <file>` or `render --old <file> --new <file>`.");
  });

  withOutputOptions(
    program
      .command("staged")
      .description("Render ribbons for uncommitted changes (staged + unstaged) against HEAD")
      .option("--staged-only", "Use only staged changes")
      .option("--repo <path>", "Repository path", process.cwd())
      .option("--path <file>", "File to render (default: first changed file)"),
    theme,
  ).action(async (options: OutputOptions & { stagedOnly?: boolean; repo: string; path?: string }) => {
    await render(
      { type: "worktree", repoPath: options.repo, path: options.path, stagedOnly: options.stagedOnly === true },
      options,
    );
  });

  return program;
};
