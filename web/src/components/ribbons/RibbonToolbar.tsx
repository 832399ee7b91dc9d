import type { RibbonMode } from "#core/ribbons/types";
import type { RibbonStats } from "./ribbonStats";

interface RibbonToolbarProps {
  title: string;
  ribbonStyle: RibbonMode;
  stats: RibbonStats;
  onRibbonStyleChange: (style: RibbonMode) => void;
}

export const RibbonToolbar = ({ title, ribbonStyle, stats, onRibbonStyleChange }: RibbonToolbarProps) => (
  <div className="diffNavBar">
    <h4 className="codeDiffTitle">{title}</h4>
    <div className="diffNavControls">
      <span className="diffCount additionCount">+{stats.additions}</span>
      <span className="diffCount deletionCount">-{stats.deletions}</span>
      <span className="diffCount changeCount">~{stats.changes}</span>
      <div className="ribbonStyleToggle" role="group" aria-label="Ribbon style">
        <button
          type="button"
          className={ribbonStyle === "fluid" ? "active" : ""}
          onClick={() => onRibbonStyleChange("fluid")}
        >
          Fluid
        </button>
        <button
          type="button"
          className={ribbonStyle === "blocks" ? "active" : ""}
          onClick={() => onRibbonStyleChange("blocks")}
        >
          Blocks
        </button>
      </div>
    </div>
  </div>
);
