import { observer } from "mobx-react-lite";
import { useDeferredValue, useMemo, useState, type ChangeEvent } from "react";
import { pairTexts } from "#core/pairing/textPairing";
import { RIBBON_THEMES, type ThemeName } from "#core/ribbons/theme";
import type { RibbonMode } from "#core/ribbons/types";
import { countConnections } from "./components/ribbons/ribbonStats";
import { RibbonSplitView } from "./components/ribbons/RibbonSplitView";
import { RibbonToolbar } from "./components/ribbons/RibbonToolbar";
import { RibbonViewStore } from "./components/ribbons/store";

const SAMPLE_OLD = [
  "export const total = (items) => {",
  "  let sum = 0;",
  "  for (const item of items) {",
  "    sum += item.price;",
  "  }",
  "  return sum;",
  "};",
].join("\n");

const SAMPLE_NEW = [
  "export const total = (items: Item[]): number => {",
  "  let sum = 0;",
  "  for (const item of items) {",
  "    sum += item.price * item.quantity;",
  "  }",
  "  console.debug(\"total\", sum);",
  "  return sum;",
  "};",
].join("\n");

const LANGUAGES = ["typescript", "javascript", "python", "text"] as const;

const App = observer(() => {
  /******************* STORE ***********************/
  const [store] = useState(() => RibbonViewStore.create());
  const [oldText, setOldText] = useState(SAMPLE_OLD);
  const [newText, setNewText] = useState(SAMPLE_NEW);
  const [theme, setTheme] = useState<ThemeName>("dark");
  const [language, setLanguage] = useState<string>("typescript");

  /******************* COMPUTED ***********************/
  const deferredOld = useDeferredValue(oldText);
  const deferredNew = useDeferredValue(newText);
  const pairs = useMemo(() => pairTexts(deferredOld, deferredNew), [deferredOld, deferredNew]);
  const stats = useMemo(() => countConnections(pairs), [pairs]);
  const palette = RIBBON_THEMES[theme];

  /******************* FUNCTIONS ***********************/
  const onOldChange = (event: ChangeEvent<HTMLTextAreaElement>) => setOldText(event.target.value);
  const onNewChange = (event: ChangeEvent<HTMLTextAreaElement>) => setNewText(event.target.value);
  const onStyleChange = (style: RibbonMode) => store.setRibbonStyle(style);

  return (
    <main className="appContainer">
      <header className="appHeader">
        <strong>Diff Ribbons</strong>
        <label htmlFor="theme-select">
          Theme{" "}
          <select
            id="theme-select"
            value={theme}
            onChange={(event) => setTheme(event.target.value === "light" ? "light" : "dark")}
          >
            <option value="dark">dark</option>
            <option value="light">light</option>
          </select>
        </label>
        <label htmlFor="language-select">
          Language{" "}
          <select id="language-select" value={language} onChange={(event) => setLanguage(event.target.value)}>
            {LANGUAGES.map((entry) => (
              <option key={entry} value={entry}>{entry}</option>
            ))}
          </select>
        </label>
      </header>
      <section className="sourceInputs">
        <textarea aria-label="Old text" value={oldText} onChange={onOldChange} spellCheck={false} />
        <textarea aria-label="New text" value={newText} onChange={onNewChange} spellCheck={false} />
      </section>
      <RibbonToolbar
        title={`${pairs.length} rows`}
        ribbonStyle={store.ribbonStyle}
        stats={stats}
        onRibbonStyleChange={onStyleChange}
      />
      <RibbonSplitView store={store} pairs={pairs} palette={palette} language={language} />
    </main>
  );
});

export default App;
