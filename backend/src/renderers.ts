import path from "node:path";
import { defaultArtifactName, openInViewer, writeArtifact } from "./artifact.js";
import type { AutoPlotter, RenderInput } from "./autoPlotter.js";
import { renderLegacyHtml } from "./legacyRenderer.js";
import { createComponentLogger, type Logger } from "./logger.js";
import { resolveTheme, type ThemeSpecifier } from "./themes.js";

export type RenderRequest = RenderInput;

export interface ChartRenderer {
  readonly kind: "autoplot" | "legacy";
  render(request: RenderRequest): string;
}

export class AutoPlotRenderer implements ChartRenderer {
  readonly kind = "autoplot";

  constructor(private readonly plotter: AutoPlotter) {}

  render(request: RenderRequest): string {
    return this.plotter.render(request);
  }
}

export interface LegacyRendererOptions {
  outputDir?: string;
  theme?: ThemeSpecifier | string;
  logger?: Logger;
}

/** The fixed candles/volume/trades/equity page; indicator requests are ignored. */
export class LegacyRenderer implements ChartRenderer {
  readonly kind = "legacy";
  private readonly outputDir: string;
  private readonly theme: ThemeSpecifier | string;
  private readonly logger: Logger;

  constructor(options: LegacyRendererOptions = {}) {
    this.outputDir = options.outputDir ?? ".";
    this.theme = options.theme ?? "light";
    this.logger = options.logger ?? createComponentLogger("LegacyRenderer");
  }

  render(request: RenderRequest): string {
    const title = request.title ?? "Backtest";
    const html = renderLegacyHtml(
      {
        prices: request.prices,
        trades: request.trades ?? [],
        equity: request.equity ?? [],
        title,
        theme: resolveTheme(request.theme ?? this.theme)
      },
      this.logger
    );
    const written = writeArtifact(request.filename ?? path.join(this.outputDir, defaultArtifactName(title)), html);
    this.logger.info(`Legacy chart written to ${written}`);
    if (request.open) {
      openInViewer(written, this.logger);
    }
    return written;
  }
}
