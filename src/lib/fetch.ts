import { promises as fs } from "node:fs";
import path from "node:path";
import { silentLogger } from "./log";
import type { Logger } from "./log";

// Browser-like headers so the server returns the same page a user would get.
export const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";
export const ACCEPT_LANGUAGE = "en-US,en;q=0.9";
export const DEFAULT_TIMEOUT_MS = 45_000;

export type FetchListOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
  cacheDir?: string;
  logger?: Logger;
};

export function safeFilenameFromUrl(url: string) {
  return (
    url
      .replace(/^https?:\/\//, "")
      .replace(/[^\w]+/g, "__")
      .slice(0, 180) + ".html"
  );
}

async function readCached(fp: string): Promise<string | null> {
  try {
    return await fs.readFile(fp, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * GET a list page as text. Aborts on `signal` or after `timeoutMs`.
 * With `cacheDir`, a page fetched once is read back from disk afterwards.
 */
export async function fetchListHtml(url: string, options: FetchListOptions = {}): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let cachePath: string | null = null;
  if (options.cacheDir) {
    await fs.mkdir(options.cacheDir, { recursive: true });
    cachePath = path.join(options.cacheDir, safeFilenameFromUrl(url));
    const cached = await readCached(cachePath);
    if (cached !== null) {
      logger.debug(`cache hit: ${url}`);
      return cached;
    }
  }

  options.signal?.throwIfAborted();

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`Fetch timed out after ${timeoutMs} ms: ${url}`)),
    timeoutMs
  );
  const forwardAbort = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    logger.info(`Downloading list from ${url}`);
    const res = await fetch(url, {
      headers: {
        "User-Agent": USER_AGENT,
        "Accept-Language": ACCEPT_LANGUAGE,
      },
      signal: controller.signal,
    });

    if (!res.ok) {
      throw new Error(`Fetch failed ${res.status} ${res.statusText}: ${url}`);
    }

    const html = await res.text();
    if (cachePath) await fs.writeFile(cachePath, html, "utf8");
    return html;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}
