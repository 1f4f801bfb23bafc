import { UnknownThemeError } from "./errors.js";

export type ThemeName = "light" | "dark";

export const THEME_NAMES: readonly ThemeName[] = ["light", "dark"];

/** Marker shapes understood by the chart library. */
export type MarkerShape = "arrowUp" | "arrowDown" | "circle" | "square";

export interface Theme {
  name: string;
  upColor: string;
  downColor: string;
  backgroundColor: string;
  gridColor: string;
  textColor: string;
  buyColor: string;
  sellColor: string;
  buyMarker: MarkerShape;
  sellMarker: MarkerShape;
  width: string;
  height: string;
  lineWidth: number;
  /** Default colors keyed by series label, e.g. `MA20` or `KDJ_k`. */
  seriesColors: Readonly<Record<string, string>>;
  /** Colors handed out in order to series nothing else colors. */
  palette: readonly string[];
}

export interface CustomTheme extends Partial<Omit<Theme, "name">> {
  type: "custom";
  name?: string;
}

export type ThemeSpecifier = ThemeName | CustomTheme;

const SERIES_COLORS: Readonly<Record<string, string>> = {
  MA5: "#FF6B6B",
  MA10: "#4ECDC4",
  MA20: "#45B7D1",
  MA30: "#96CEB4",
  MA60: "#FFEAA7",
  EMA12: "#DDA0DD",
  EMA26: "#98D8C8",
  Equity: "#2962FF"
};

const PALETTE = ["#2962FF", "#FF6D00", "#2E7D32", "#AA00FF", "#C51162", "#00838F", "#6D4C41", "#F9A825"];

export const LIGHT_THEME: Readonly<Theme> = Object.freeze({
  name: "light",
  upColor: "#ec0000",
  downColor: "#00da3c",
  backgroundColor: "#ffffff",
  gridColor: "#e0e0e0",
  textColor: "#000000",
  buyColor: "#00da3c",
  sellColor: "#ec0000",
  buyMarker: "arrowUp",
  sellMarker: "arrowDown",
  width: "100%",
  height: "800px",
  lineWidth: 1,
  seriesColors: SERIES_COLORS,
  palette: PALETTE
});

export const DARK_THEME: Readonly<Theme> = Object.freeze({
  ...LIGHT_THEME,
  name: "dark",
  backgroundColor: "#1f1f1f",
  gridColor: "#404040",
  textColor: "#ffffff"
});

const BUILTIN: Record<ThemeName, Readonly<Theme>> = {
  light: LIGHT_THEME,
  dark: DARK_THEME
};

export const isBuiltinTheme = (value: string): value is ThemeName =>
  THEME_NAMES.some((name) => name === value);

const copyTheme = (theme: Readonly<Theme>): Theme => ({
  ...theme,
  seriesColors: { ...theme.seriesColors },
  palette: [...theme.palette]
});

/**
 * Resolves a theme name or custom theme into a concrete theme. Fields a custom theme
 * leaves unset come from the light theme one by one; `seriesColors` merges per key.
 */
export function resolveTheme(specifier: ThemeSpecifier | string): Theme {
  if (typeof specifier === "string") {
    if (!isBuiltinTheme(specifier)) {
      throw new UnknownThemeError(specifier, THEME_NAMES);
    }
    return copyTheme(BUILTIN[specifier]);
  }

  const base = LIGHT_THEME;
  return {
    name: specifier.name ?? "custom",
    upColor: specifier.upColor ?? base.upColor,
    downColor: specifier.downColor ?? base.downColor,
    backgroundColor: specifier.backgroundColor ?? base.backgroundColor,
    gridColor: specifier.gridColor ?? base.gridColor,
    textColor: specifier.textColor ?? base.textColor,
    buyColor: specifier.buyColor ?? base.buyColor,
    sellColor: specifier.sellColor ?? base.sellColor,
    buyMarker: specifier.buyMarker ?? base.buyMarker,
    sellMarker: specifier.sellMarker ?? base.sellMarker,
    width: specifier.width ?? base.width,
    height: specifier.height ?? base.height,
    lineWidth: specifier.lineWidth ?? base.lineWidth,
    seriesColors: { ...base.seriesColors, ...specifier.seriesColors },
    palette: specifier.palette && specifier.palette.length > 0 ? [...specifier.palette] : [...base.palette]
  };
}
