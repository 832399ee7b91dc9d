import type { VisibleRange } from "./types.js";

const MIN_BUFFER_ROWS = 10;

/** Rows to paint for a scroll position, padded by at least one viewport on each side. */
export const computeVisibleRange = (
  scrollTop: number,
  viewportHeight: number,
  lineHeight: number,
  pairCount: number,
): VisibleRange => {
  if (pairCount <= 0 || lineHeight <= 0) return { start: 0, end: 0 };
  const buffer = Math.max(MIN_BUFFER_ROWS, Math.floor(viewportHeight / lineHeight));
  const start = Math.max(0, Math.floor(scrollTop / lineHeight) - buffer);
  const end = Math.min(pairCount, Math.floor((scrollTop + viewportHeight) / lineHeight) + buffer);
  return { start, end: Math.max(start, end) };
};
