import path from "node:path";

export const FALLBACK_FILE_NAME = "maps-list";

// Characters rejected by at least one common file system.
const INVALID_FILE_NAME_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;

export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(INVALID_FILE_NAME_CHARS, "_").replace(/^[_ ]+|[_ ]+$/g, "");
  return cleaned || FALLBACK_FILE_NAME;
}

/**
 * Absolute path for the KML file: the requested path as given, otherwise the
 * sanitized list name with a .kml extension in `cwd`.
 */
export function resolveOutputPath(requested: string | undefined, listName: string, cwd = process.cwd()): string {
  if (requested && requested.trim() !== "") return path.resolve(cwd, requested);

  const base = sanitizeFileName(listName);
  const fileName = base.toLowerCase().endsWith(".kml") ? base : `${base}.kml`;
  return path.resolve(cwd, fileName);
}

/** Sibling path with a different extension, e.g. list.kml → list.csv. */
export function siblingPath(filePath: string, ext: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${ext}`);
}
