import { UnknownRequestError, UnknownThemeError } from "./errors.js";
import type { IndicatorStyle, ParamValue } from "./indicators.js";
import { isBuiltinTheme, THEME_NAMES, type ThemeSpecifier } from "./themes.js";

export type IndicatorParams = Readonly<Record<string, ParamValue>>;

export interface IndicatorRequest {
  name: string;
  params: IndicatorParams;
  enabled: boolean;
  style?: IndicatorStyle;
}

/**
 * A strategy's ordered indicator requests and chosen theme. Requests are keyed by
 * name, ignoring case as the registry does; re-adding a name replaces the request in place.
 */
const keyOf = (name: string) => name.trim().toUpperCase();

export class PlotConfigStore {
  private readonly requests = new Map<string, IndicatorRequest>();
  private themeSpecifier?: ThemeSpecifier;

  get theme(): ThemeSpecifier | undefined {
    return this.themeSpecifier;
  }

  /** Sets the theme; a bad name fails here rather than at render time. */
  configureTheme(theme: ThemeSpecifier | string): this {
    if (typeof theme !== "string") {
      this.themeSpecifier = { ...theme };
      return this;
    }
    if (!isBuiltinTheme(theme)) {
      throw new UnknownThemeError(theme, THEME_NAMES);
    }
    this.themeSpecifier = theme;
    return this;
  }

  addIndicator(name: string, enabled = true, params: IndicatorParams = {}, style?: IndicatorStyle): this {
    this.requests.set(keyOf(name), Object.freeze({ name: name.trim(), params: Object.freeze({ ...params }), enabled, style }));
    return this;
  }

  removeIndicator(name: string): this {
    this.requests.delete(keyOf(name));
    return this;
  }

  enableIndicator(name: string, enabled = true): this {
    const key = keyOf(name);
    const request = this.requests.get(key);
    if (!request) {
      throw new UnknownRequestError(name);
    }
    this.requests.set(key, Object.freeze({ ...request, enabled }));
    return this;
  }

  get(name: string): IndicatorRequest | undefined {
    return this.requests.get(keyOf(name));
  }

  list(): IndicatorRequest[] {
    return Array.from(this.requests.values());
  }

  listEnabled(): IndicatorRequest[] {
    return this.list().filter((request) => request.enabled);
  }

  clear(): void {
    this.requests.clear();
    this.themeSpecifier = undefined;
  }
}
