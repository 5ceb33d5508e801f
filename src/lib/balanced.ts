/**
 * Slice out the bracketed expression that follows `markerPrefix`.
 *
 * The surrounding text is script source, not JSON, so this only tracks string
 * literals (double quotes with backslash escapes) and open/close nesting depth.
 * Returns null when the marker, the opening character or the matching close is missing.
 */
export function extractBalanced(
  text: string,
  markerPrefix: string,
  openChar: string,
  closeChar: string
): string | null {
  const markerIndex = text.indexOf(markerPrefix);
  if (markerIndex < 0) return null;

  const start = text.indexOf(openChar, markerIndex + markerPrefix.length);
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === openChar) {
      depth++;
    } else if (ch === closeChar) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}
