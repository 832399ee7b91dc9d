import parseGitDiff from "parse-git-diff";
import type { DiffLineRecord } from "../ribbons/types.js";
import type { DiffHunk } from "./pairBuilder.js";

type ParsedFile = ReturnType<typeof parseGitDiff>["files"][number];

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/;

const filePath = (file: ParsedFile): string => ("path" in file ? file.path : file.pathAfter);

/** Hunk header lines as written, in the order the parser reports text chunks. */
const headerLines = (diffText: string): Iterator<string> =>
  diffText
    .split(/\r?\n/)
    .filter((line) => HUNK_HEADER.test(line))
    [Symbol.iterator]();

const textHunks = (file: ParsedFile, headers: Iterator<string>): DiffHunk[] => {
  const hunks: DiffHunk[] = [];
  for (const chunk of file.chunks) {
    if (chunk.type !== "Chunk") continue;
    const next = headers.next();
    const { fromFileRange: from, toFileRange: to } = chunk;
    const lines: DiffLineRecord[] = [];
    for (const change of chunk.changes) {
      switch (change.type) {
        case "AddedLine":
          lines.push({ kind: "addition", content: change.content, oldLineNumber: null, newLineNumber: change.lineAfter });
          break;
        case "DeletedLine":
          lines.push({ kind: "deletion", content: change.content, oldLineNumber: change.lineBefore, newLineNumber: null });
          break;
        case "UnchangedLine":
          lines.push({
            kind: "context",
            content: change.content,
            oldLineNumber: change.lineBefore,
            newLineNumber: change.lineAfter,
          });
          break;
        default:
          // "\ No newline at end of file" and similar markers occupy no row.
          break;
      }
    }
    const header = next.done
      ? `@@ -${from.start},${from.lines} +${to.start},${to.lines} @@${chunk.context ? ` ${chunk.context}` : ""}`
      : next.value;
    hunks.push({ header, lines });
  }
  return hunks;
};

/**
 * Text hunks of one file from a unified diff: the file at `path` when
 * given, otherwise the first file that has any.
 */
export const readPatchHunks = (diffText: string, path?: string): { path: string; hunks: DiffHunk[] } => {
  const parsed = parseGitDiff(diffText);
  const headers = headerLines(diffText);
  for (const file of parsed.files) {
    const candidate = filePath(file);
    // Skipped files still consume their headers.
    const hunks = textHunks(file, headers);
    if (path !== undefined && candidate !== path) continue;
    if (hunks.length > 0) return { path: candidate, hunks };
  }
  throw new Error(path === undefined ? "Patch contains no text hunks" : `Patch contains no text hunks for ${path}`);
};
