/**
 * HTML Export
 * 
 * Writes a Figure as a standalone HTML page rendered by plotly.js, and
 * optionally opens it in the default browser.
 */

import fs from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import open from 'open';
import { z } from 'zod';
import { config } from '../config';
import type { PlotlyJsMode } from '../config';
import { loggers } from '../logging/logger';
import { ErrorHandler } from '../../shared/errors';
import type { Figure } from './figure';

const PlotlyPackageSchema = z.object({ version: z.string().min(1) });

export const PLOT_CONFIG = {
  displayModeBar: true,
  displaylogo: false,
  modeBarButtonsToRemove: ['pan2d', 'lasso2d', 'select2d'],
  responsive: true
} as const;

export interface ExportOptions {
  /** Where to write the HTML file */
  outputPath?: string;
  /** Open the written file in the browser */
  show?: boolean;
  plotlyJs?: PlotlyJsMode;
}

export interface RenderOptions {
  plotlyJs: PlotlyJsMode;
  pageTitle: string;
  divId?: string;
}

let plotlyBundle: string | undefined;
let plotlyRelease: string | undefined;

function readPlotlyBundle(): string {
  if (plotlyBundle === undefined) {
    const bundlePath = require.resolve('plotly.js-dist-min');
    plotlyBundle = fs.readFileSync(bundlePath, 'utf-8');
  }
  return plotlyBundle;
}

/**
 * Version of the installed plotly.js-dist-min, the one inline mode embeds
 */
export function plotlyVersion(): string {
  if (plotlyRelease === undefined) {
    const manifestPath = require.resolve('plotly.js-dist-min/package.json');
    const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
    plotlyRelease = PlotlyPackageSchema.parse(manifest).version;
  }
  return plotlyRelease;
}

/**
 * CDN copy of the same release, so both script modes render identically
 */
export function plotlyCdnUrl(): string {
  return `https://cdn.plot.ly/plotly-${plotlyVersion()}.min.js`;
}

/**
 * JSON that is safe inside a <script> element
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Plain-text page title from a chart title ("Skills<br><sub>...</sub>" -> "Skills")
 */
export function pageTitleFor(figure: Figure): string {
  const [firstLine] = figure.layout.title.text.split('<br>');
  return firstLine.replace(/<[^>]*>/g, '').trim();
}

export function renderFigureHtml(figure: Figure, options: RenderOptions): string {
  const divId = options.divId ?? 'portfolio-chart';
  const plotlyScript = options.plotlyJs === 'cdn'
    ? `<script src="${plotlyCdnUrl()}" charset="utf-8"></script>`
    : `<script type="text/javascript">${readPlotlyBundle()}</script>`;

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8" />',
    `<title>${escapeHtml(options.pageTitle)}</title>`,
    '</head>',
    '<body>',
    `<div id="${divId}"></div>`,
    plotlyScript,
    '<script type="text/javascript">',
    `Plotly.newPlot(${toScriptJson(divId)}, ${toScriptJson(figure.data)}, ` +
      `${toScriptJson(figure.layout)}, ${toScriptJson(PLOT_CONFIG)});`,
    '</script>',
    '</body>',
    '</html>',
    ''
  ].join('\n');
}

/**
 * Absolute output path, defaulting to `fileName` in the configured directory
 */
export function resolveOutputPath(fileName: string, outputPath?: string): string {
  return path.resolve(outputPath ?? path.join(config.output.directory, fileName));
}

/**
 * Write the figure and open it when asked. Returns the absolute path written.
 */
export async function exportFigure(
  figure: Figure,
  fileName: string,
  options: ExportOptions = {}
): Promise<string> {
  const outputPath = resolveOutputPath(fileName, options.outputPath);
  const html = renderFigureHtml(figure, {
    plotlyJs: options.plotlyJs ?? config.output.plotlyJs,
    pageTitle: pageTitleFor(figure)
  });

  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, html, 'utf-8');
  } catch (error) {
    throw ErrorHandler.createFileError(
      `Failed to write ${path.basename(outputPath)}`,
      error instanceof Error ? error.message : String(error),
      { outputPath }
    );
  }

  loggers.charts.debug({ outputPath, bytes: html.length }, 'Chart written');

  if (options.show) {
    await open(outputPath);
  }

  return outputPath;
}
