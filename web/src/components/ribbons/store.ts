import { comparer, computed } from "mobx";
import { types } from "mobx-state-tree";
import { computeVisibleRange } from "#core/ribbons/visibleRange";
import type { RibbonMode, VisibleRange } from "#core/ribbons/types";

export const DEFAULT_LINE_HEIGHT = 22;

export const RibbonViewStore = types
  .model("RibbonViewStore", {
    ribbonStyle: types.optional(types.enumeration<RibbonMode>(["fluid", "blocks"]), "fluid"),
    lineHeight: types.optional(types.number, DEFAULT_LINE_HEIGHT),
    pairCount: types.optional(types.number, 0),
    scrollTop: types.optional(types.number, 0),
    viewWidth: types.optional(types.number, 0),
    viewportHeight: types.optional(types.number, 0),
  })
  .views((self) => {
    // Same object until the row window moves, so scrolling within a row does not repaint.
    const range = computed(
      (): VisibleRange => computeVisibleRange(self.scrollTop, self.viewportHeight, self.lineHeight, self.pairCount),
      { equals: comparer.structural },
    );

    return {
      get isFluidMode(): boolean {
        return self.ribbonStyle === "fluid";
      },

      get visibleRange(): VisibleRange {
        return range.get();
      },
    };
  })
  .actions((self) => ({
    setRibbonStyle(style: RibbonMode) {
      self.ribbonStyle = style;
    },

    setLineHeight(next: number) {
      if (!Number.isFinite(next) || next <= 0) return;
      self.lineHeight = next;
    },

    setPairCount(count: number) {
      self.pairCount = Math.max(0, count);
    },

    setScrollTop(next: number) {
      self.scrollTop = Math.max(0, next);
    },

    setViewport(width: number, height: number) {
      self.viewWidth = Math.max(0, width);
      self.viewportHeight = Math.max(0, height);
    },
  }));

export type RibbonViewStoreInstance = typeof RibbonViewStore.Type;
