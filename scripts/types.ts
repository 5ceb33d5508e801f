// Shared types for script files

export type ExportOptions = {
  inputListUrl: string;
  outputFile?: string;
  csv: boolean;
  geojson: boolean;
  reportPath?: string;
  cacheDir?: string;
  timeoutMs: number;
  verbose: boolean;
};

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "error"; message: string }
  | { kind: "ok"; options: ExportOptions };
