import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface WorktreePatchOptions {
  repoPath: string;
  /** Limit the diff to one file. */
  path?: string;
  stagedOnly?: boolean;
}

/** Unified diff of uncommitted changes against HEAD (or of the index only). */
export const readWorktreePatch = async (options: WorktreePatchOptions): Promise<string> => {
  const args = options.stagedOnly ? ["diff", "--cached", "--no-color"] : ["diff", "HEAD", "--no-color"];
  if (options.path !== undefined) args.push("--", options.path);
  const { stdout } = await execFileAsync("git", args, { cwd: options.repoPath, maxBuffer: 1024 * 1024 * 50 });
  return stdout;
};
