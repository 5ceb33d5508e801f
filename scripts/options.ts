import { DEFAULT_TIMEOUT_MS } from "@/lib/fetch";
import type { ExportOptions, ParsedArgs } from "./types";

const HELP_FLAGS = ["--help", "-h", "-?", "/?"];

const VALUE_FLAGS = ["--inputList", "--outputFile", "--report", "--cacheDir", "--timeout"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((f) => f === arg);
}

export function wantsHelp(args: string[]): boolean {
  return args.some((a) => HELP_FLAGS.includes(a.toLowerCase()));
}

function isHttpUrl(value: string): boolean {
  try {
    const u = new URL(value);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

export function parseArgs(args: string[]): ParsedArgs {
  if (wantsHelp(args)) return { kind: "help" };

  const values: Partial<Record<ValueFlag, string>> = {};
  let csv = false;
  let geojson = false;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value === undefined) return { kind: "error", message: `The ${arg} option requires a value.` };
      values[arg] = value;
      i++;
      continue;
    }

    switch (arg) {
      case "--csv":
        csv = true;
        break;
      case "--geojson":
        geojson = true;
        break;
      case "--verbose":
        verbose = true;
        break;
      default:
        return {
          kind: "error",
          message: arg.startsWith("--") ? `Unknown option '${arg}'.` : `Unexpected argument '${arg}'.`,
        };
    }
  }

  const inputListUrl = values["--inputList"]?.trim();
  if (!inputListUrl) return { kind: "error", message: "The --inputList argument is required." };
  if (!isHttpUrl(inputListUrl)) {
    return { kind: "error", message: "The value provided to --inputList must be a valid absolute URL." };
  }

  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (values["--timeout"] !== undefined) {
    const seconds = Number(values["--timeout"]);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      return { kind: "error", message: "The --timeout option must be a positive number of seconds." };
    }
    timeoutMs = seconds * 1000;
  }

  const options: ExportOptions = { inputListUrl, csv, geojson, timeoutMs, verbose };
  const outputFile = values["--outputFile"]?.trim();
  if (outputFile) options.outputFile = outputFile;
  if (values["--report"]) options.reportPath = values["--report"];
  if (values["--cacheDir"]) options.cacheDir = values["--cacheDir"];
  return { kind: "ok", options };
}

export function usage(): string {
  return [
    "Usage: npm run export -- --inputList <url> [--outputFile <path>] [--csv] [--geojson] [--report <path>] [--cacheDir <dir>] [--timeout <seconds>] [--verbose]",
    "",
    "Required arguments:",
    "  --inputList     The shared Google Maps list URL to download and convert.",
    "",
    "Optional arguments:",
    "  --outputFile    Path of the KML file to create. Defaults to the list name with a .kml extension.",
    "  --csv           Also write a CSV file next to the KML file.",
    "  --geojson       Also write a GeoJSON file next to the KML file.",
    "  --report        Write a JSON validation report to this path.",
    "  --cacheDir      Cache downloaded pages in this directory.",
    `  --timeout       HTTP timeout in seconds (default ${DEFAULT_TIMEOUT_MS / 1000}).`,
    "  --verbose       Enables verbose logging for troubleshooting.",
    "  --help, -h      Displays this usage information.",
  ].join("\n");
}
