import { extractBalanced } from "./balanced";
import { decodeList } from "./decode";
import { ListExtractionError } from "./errors";
import { findInitializationScript, INIT_STATE_NAME } from "./html";
import { silentLogger } from "./log";
import type { Logger } from "./log";
import { findSignatureMatch } from "./signature";
import { parseTree } from "./tree";
import type { MapsListData } from "./types";

export const PAYLOAD_MARKER = `${INIT_STATE_NAME}=`;

export type ExtractOptions = {
  logger?: Logger;
  maxDepth?: number;
};

/**
 * Script text → list data: slice the payload, parse it, find the list array, decode it.
 */
export function extractListFromScript(script: string, options: ExtractOptions = {}): MapsListData {
  const logger = options.logger ?? silentLogger;

  const payload = extractBalanced(script, PAYLOAD_MARKER, "[", "]");
  if (payload === null) {
    throw new ListExtractionError(
      "PayloadExtractionFailed",
      `Failed to isolate the ${INIT_STATE_NAME} JSON payload (missing or unbalanced array).`
    );
  }
  logger.debug(`Isolated a ${payload.length}-character initialization payload.`);

  const root = parseTree(payload, { maxDepth: options.maxDepth });

  const listArray = findSignatureMatch(root, { maxDepth: options.maxDepth });
  if (!listArray) {
    throw new ListExtractionError(
      "SignatureNotFound",
      "Payload parsed, but no list entry matched the expected share URL signature; the page format has probably changed."
    );
  }

  return decodeList(listArray, { logger });
}

/** Full HTML page → list data. */
export function extractListFromHtml(html: string, options: ExtractOptions = {}): MapsListData {
  const logger = options.logger ?? silentLogger;

  const script = findInitializationScript(html);
  if (script === null) {
    throw new ListExtractionError(
      "ScriptNotFound",
      `Unable to locate the ${INIT_STATE_NAME} script in the retrieved HTML.`
    );
  }
  logger.debug("Found the script holding the initialization state.");

  return extractListFromScript(script, options);
}
