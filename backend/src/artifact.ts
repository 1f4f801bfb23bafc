import { spawn } from "node:child_process";
import { mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { ArtifactWriteError } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * Writes `content` to `target` through a sibling temp file that is renamed into place.
 * On failure the temp file is removed and `target` is left untouched.
 */
export function writeArtifact(target: string, content: string): string {
  const resolved = path.resolve(target);
  const temp = `${resolved}.${process.pid}.${Date.now()}.tmp`;
  try {
    mkdirSync(path.dirname(resolved), { recursive: true });
    writeFileSync(temp, content, "utf8");
    renameSync(temp, resolved);
  } catch (error) {
    rmSync(temp, { force: true });
    throw new ArtifactWriteError(resolved, error);
  }
  return resolved;
}

/** `My Strategy` → `My_Strategy_backtest_result.html` */
export function defaultArtifactName(title: string): string {
  const stem = title.trim().replace(/[^\w.-]+/g, "_").replace(/^_+|_+$/g, "");
  return `${stem || "chart"}_backtest_result.html`;
}

const viewerCommand = (file: string): [string, string[]] => {
  switch (process.platform) {
    case "darwin":
      return ["open", [file]];
    case "win32":
      return ["cmd", ["/c", "start", "", file]];
    default:
      return ["xdg-open", [file]];
  }
};

/** Opens the file with the platform viewer without waiting for it. */
export function openInViewer(file: string, logger: Logger): void {
  const [command, args] = viewerCommand(file);
  const child = spawn(command, args, { detached: true, stdio: "ignore" });
  child.on("error", (error) => {
    logger.warn(`Could not open ${file} with ${command}: ${error.message}`);
  });
  child.unref();
}
