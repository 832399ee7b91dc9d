import { observer } from "mobx-react-lite";
import { useCallback, useEffect, useRef, type CSSProperties } from "react";
import { RIBBON_GAP } from "#core/ribbons/geometry";
import type { DiffLineRecord, DiffPairWithConnection, RibbonPalette } from "#core/ribbons/types";
import { ConnectionRibbons } from "./ConnectionRibbons";
import { HighlightedCode } from "./HighlightedCode";
import { lineNumberFor, lineStyle } from "./lineStyle";
import type { RibbonViewStoreInstance } from "./store";

interface RibbonSplitViewProps {
  store: RibbonViewStoreInstance;
  pairs: readonly DiffPairWithConnection[];
  palette: RibbonPalette;
  language: string;
}

const hunkHeaderStyle: CSSProperties = {
  gridColumn: "1 / -1",
  background: "rgba(148, 163, 184, 0.16)",
  color: "#fcd34d",
  paddingLeft: 8,
  whiteSpace: "pre",
};

const LineCell = ({ line, side, language }: { line: DiffLineRecord | undefined; side: "old" | "new"; language: string }) => (
  <div className={`ribbonLine ${side}Line`} style={lineStyle(line)}>
    <span className="lineNum">{lineNumberFor(line, side) ?? ""}</span>
    <span className="lineCode">
      {line ? <HighlightedCode code={line.content} language={language} /> : " "}
    </span>
  </div>
);

export const RibbonSplitView = observer(({ store, pairs, palette, language }: RibbonSplitViewProps) => {
  const scrollRef = useRef<HTMLDivElement | null>(null);

  const handleScroll = useCallback(() => {
    const container = scrollRef.current;
    if (!container) return;
    store.setScrollTop(container.scrollTop);
  }, [store]);

  useEffect(() => {
    const container = scrollRef.current;
    if (!container) return;
    const measure = (): void => store.setViewport(container.clientWidth, container.clientHeight);
    measure();
    const observer = new ResizeObserver(measure);
    observer.observe(container);
    return () => observer.disconnect();
  }, [store]);

  useEffect(() => {
    store.setPairCount(pairs.length);
  }, [store, pairs.length]);

  const { lineHeight, viewWidth, viewportHeight, scrollTop } = store;
  const rowStyle: CSSProperties = { height: lineHeight, lineHeight: `${lineHeight}px` };

  return (
    <div className="ribbonSplitView" ref={scrollRef} onScroll={handleScroll}>
      <div className="ribbonOverlayAnchor">
        <ConnectionRibbons
          pairs={pairs}
          lineHeight={lineHeight}
          viewWidth={viewWidth}
          isFluidMode={store.isFluidMode}
          palette={palette}
          scrollTop={scrollTop}
          viewportHeight={viewportHeight}
          visibleRange={store.visibleRange}
        />
      </div>
      <div className="ribbonRows" style={{ gridTemplateColumns: `1fr ${RIBBON_GAP}px 1fr` }}>
        {pairs.map((pair) =>
          pair.hunkHeader !== undefined ? (
            <div key={pair.id} className="ribbonHunkHeader" style={{ ...rowStyle, ...hunkHeaderStyle }}>
              {pair.hunkHeader}
            </div>
          ) : (
            <div key={pair.id} className="ribbonRow" style={{ display: "contents" }}>
              <div style={rowStyle}>
                <LineCell line={pair.left} side="old" language={language} />
              </div>
              <div className="ribbonGutter" style={rowStyle} />
              <div style={rowStyle}>
                <LineCell line={pair.right} side="new" language={language} />
              </div>
            </div>
          ),
        )}
      </div>
    </div>
  );
});
