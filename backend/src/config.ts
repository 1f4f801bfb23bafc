import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import { isBuiltinTheme, type ThemeName } from "./themes.js";

export interface ChartConfig {
  outputDir: string;
  theme: ThemeName;
  scriptUrl?: string;
  logLevel: LogLevel;
  databaseUrl?: string;
}

type Env = Record<string, string | undefined>;

let envLoaded = false;

/** Loads `.env` into `process.env` once per process. */
export function loadEnvFile() {
  if (envLoaded) return;
  dotenv.config();
  envLoaded = true;
}

const readString = (env: Env, key: string) => {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
};

export function loadConfig(env: Env = process.env): ChartConfig {
  if (env === process.env) {
    loadEnvFile();
  }

  const theme = readString(env, "CHART_THEME") ?? "light";
  if (!isBuiltinTheme(theme)) {
    throw new ConfigError("CHART_THEME", `expected "light" or "dark", got "${theme}"`);
  }

  const logLevel = readString(env, "LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("LOG_LEVEL", `unsupported level "${logLevel}"`);
  }

  const scriptUrl = readString(env, "CHART_SCRIPT_URL");
  if (scriptUrl && !/^https?:\/\//i.test(scriptUrl)) {
    throw new ConfigError("CHART_SCRIPT_URL", "must be an http(s) URL");
  }

  return {
    outputDir: readString(env, "CHART_OUTPUT_DIR") ?? ".",
    theme,
    scriptUrl,
    logLevel,
    databaseUrl: readString(env, "DATABASE_URL")
  };
}
