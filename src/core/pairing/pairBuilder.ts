import type { ConnectionType, DiffLineRecord, DiffPairWithConnection } from "../ribbons/types.js";

export interface DiffHunk {
  header: string;
  lines: DiffLineRecord[];
}

const connectionFor = (left: DiffLineRecord | undefined, right: DiffLineRecord | undefined): ConnectionType => {
  if (left && right) return "change";
  if (left) return "deletion";
  if (right) return "addition";
  return "none";
};

/** Appends pairs in display order, numbering them from 1. */
export class PairBuilder {
  private readonly pairs: DiffPairWithConnection[] = [];
  private nextId = 1;

  header(text: string): void {
    this.push({ hunkHeader: text, connectionType: "none" });
  }

  context(left: DiffLineRecord, right: DiffLineRecord = left): void {
    this.push({ left, right, connectionType: "none" });
  }

  /** Zips a deletion run with the addition run that follows it, row by row. */
  changeRun(deletions: DiffLineRecord[], additions: DiffLineRecord[]): void {
    const rows = Math.max(deletions.length, additions.length);
    for (let idx = 0; idx < rows; idx += 1) {
      const left = deletions[idx];
      const right = additions[idx];
      this.push({ left, right, connectionType: connectionFor(left, right) });
    }
  }

  build(): DiffPairWithConnection[] {
    return [...this.pairs];
  }

  private push(pair: Omit<DiffPairWithConnection, "id">): void {
    const entry: DiffPairWithConnection = { id: this.nextId, connectionType: pair.connectionType };
    if (pair.left) entry.left = pair.left;
    if (pair.right) entry.right = pair.right;
    if (pair.hunkHeader !== undefined) entry.hunkHeader = pair.hunkHeader;
    this.pairs.push(entry);
    this.nextId += 1;
  }
}

export const pairHunks = (hunks: readonly DiffHunk[]): DiffPairWithConnection[] => {
  const builder = new PairBuilder();

  for (const hunk of hunks) {
    builder.header(hunk.header);
    const { lines } = hunk;
    let i = 0;

    while (i < lines.length) {
      const line = lines[i];
      if (line.kind === "context") {
        builder.context(line);
        i += 1;
        continue;
      }

      const deletions: DiffLineRecord[] = [];
      let j = i;
      while (j < lines.length && lines[j].kind === "deletion") {
        deletions.push(lines[j]);
        j += 1;
      }
      const additions: DiffLineRecord[] = [];
      let k = j;
      while (k < lines.length && lines[k].kind === "addition") {
        additions.push(lines[k]);
        k += 1;
      }
      builder.changeRun(deletions, additions);
      i = k;
    }
  }

  return builder.build();
};
