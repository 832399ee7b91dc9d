import type { RibbonPalette } from "./types.js";

export type ThemeName = "dark" | "light";

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export const isHexColor = (value: string): boolean => HEX_COLOR.test(value);

export const createRibbonPalette = (colors: RibbonPalette): RibbonPalette => {
  for (const key of ["addition", "deletion", "change"] as const) {
    if (!HEX_COLOR.test(colors[key])) {
      throw new Error(`Invalid ${key} color "${colors[key]}": expected #rgb or #rrggbb`);
    }
  }
  return { addition: colors.addition, deletion: colors.deletion, change: colors.change };
};

export const RIBBON_THEMES: Record<ThemeName, RibbonPalette> = {
  dark: createRibbonPalette({ addition: "#22c55e", deletion: "#ef4444", change: "#38bdf8" }),
  light: createRibbonPalette({ addition: "#16a34a", deletion: "#dc2626", change: "#0284c7" }),
};

export const isThemeName = (value: string): value is ThemeName => value === "dark" || value === "light";

export const resolvePalette = (name: ThemeName): RibbonPalette => RIBBON_THEMES[name];

const channels = (hex: string): [number, number, number] => {
  const digits = hex.slice(1);
  const full = digits.length === 3
    ? digits.split("").map((digit) => digit + digit).join("")
    : digits;
  return [
    Number.parseInt(full.slice(0, 2), 16),
    Number.parseInt(full.slice(2, 4), 16),
    Number.parseInt(full.slice(4, 6), 16),
  ];
};

export const colorWithOpacity = (hex: string, opacity: number): string => {
  if (!HEX_COLOR.test(hex)) {
    throw new Error(`Invalid color "${hex}": expected #rgb or #rrggbb`);
  }
  const [r, g, b] = channels(hex);
  return `rgba(${r}, ${g}, ${b}, ${opacity})`;
};
