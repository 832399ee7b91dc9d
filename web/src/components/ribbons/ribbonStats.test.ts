import { describe, expect, it } from "vitest";
import { pairTexts } from "#core/pairing/textPairing";
import { countConnections } from "./ribbonStats";

describe("countConnections", () => {
  it("counts each connection type and ignores unconnected rows", () => {
    const pairs = pairTexts("a\nb\nc\nx\n", "a\nB\nc\n+1\n+2\n");

    expect(countConnections(pairs)).toEqual({ additions: 1, deletions: 0, changes: 2 });
  });
});
