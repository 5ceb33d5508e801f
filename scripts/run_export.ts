import { promises as fs } from "node:fs";
import path from "node:path";
import { buildCsv } from "@/lib/export/csv";
import { buildGeoJson } from "@/lib/export/geojson";
import { buildKml } from "@/lib/export/kml";
import { extractListFromHtml } from "@/lib/extract";
import { fetchListHtml } from "@/lib/fetch";
import { silentLogger } from "@/lib/log";
import type { Logger } from "@/lib/log";
import { resolveOutputPath, siblingPath } from "@/lib/output-path";
import type { MapsListData } from "@/lib/types";
import type { ExportOptions } from "./types";
import { validateList, writeValidationReport } from "./validation";

export type ExportResult = {
  list: MapsListData;
  kmlPath: string;
  csvPath?: string;
  geojsonPath?: string;
  reportPath?: string;
};

export type RunContext = {
  signal?: AbortSignal;
  logger?: Logger;
  cwd?: string;
};

async function writeText(p: string, text: string) {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, text, "utf8");
}

/**
 * Fetch one list page and write every requested export.
 */
export async function runExport(options: ExportOptions, ctx: RunContext = {}): Promise<ExportResult> {
  const logger = ctx.logger ?? silentLogger;
  const cwd = ctx.cwd ?? process.cwd();

  const html = await fetchListHtml(options.inputListUrl, {
    signal: ctx.signal,
    timeoutMs: options.timeoutMs,
    cacheDir: options.cacheDir ? path.resolve(cwd, options.cacheDir) : undefined,
    logger,
  });

  const list = extractListFromHtml(html, { logger });
  logger.info(`Extracted ${list.places.length} places from list '${list.name}'.`);
  if (list.shareUrl) logger.debug(`Share URL: ${list.shareUrl}`);

  const result: ExportResult = {
    list,
    kmlPath: resolveOutputPath(options.outputFile, list.name, cwd),
  };

  ctx.signal?.throwIfAborted();
  await writeText(result.kmlPath, buildKml(list));
  logger.info(`✅ Wrote ${result.kmlPath}`);

  if (options.csv) {
    result.csvPath = siblingPath(result.kmlPath, ".csv");
    await writeText(result.csvPath, buildCsv(list));
    logger.info(`✅ Wrote ${result.csvPath}`);
  }

  if (options.geojson) {
    result.geojsonPath = siblingPath(result.kmlPath, ".geojson");
    await writeText(result.geojsonPath, JSON.stringify(buildGeoJson(list), null, 2));
    logger.info(`✅ Wrote ${result.geojsonPath}`);
  }

  if (options.reportPath) {
    result.reportPath = path.resolve(cwd, options.reportPath);
    await writeValidationReport(result.reportPath, validateList(list), `Export of '${list.name}'`);
  }

  return result;
}
