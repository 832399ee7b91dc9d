import type { DiffPairWithConnection } from "#core/ribbons/types";

export interface RibbonStats {
  additions: number;
  deletions: number;
  changes: number;
}

export const countConnections = (pairs: readonly DiffPairWithConnection[]): RibbonStats => {
  const stats: RibbonStats = { additions: 0, deletions: 0, changes: 0 };
  for (const pair of pairs) {
    if (pair.connectionType === "addition") stats.additions += 1;
    else if (pair.connectionType === "deletion") stats.deletions += 1;
    else if (pair.connectionType === "change") stats.changes += 1;
  }
  return stats;
};
