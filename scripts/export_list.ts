// scripts/export_list.ts
//
// Download a shared Google Maps list and export it as KML (plus CSV/GeoJSON on request).

import { createConsoleLogger } from "@/lib/log";
import { parseArgs, usage } from "./options";
import { runExport } from "./run_export";
import { withErrorHandling } from "./validation";

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === "help") {
    console.log(usage());
    return;
  }
  if (parsed.kind === "error") {
    console.error(parsed.message);
    console.log(usage());
    process.exitCode = 1;
    return;
  }

  const options = parsed.options;
  const logger = createConsoleLogger(options.verbose);

  const controller = new AbortController();
  const onSigint = () => {
    if (!controller.signal.aborted) {
      logger.warn("Cancellation requested. Attempting to stop gracefully...");
      controller.abort();
    }
  };
  process.on("SIGINT", onSigint);

  try {
    const result = await withErrorHandling(
      () => runExport(options, { signal: controller.signal, logger }),
      "List export",
      logger
    );

    if (!result.success) {
      if (controller.signal.aborted) logger.warn("Operation cancelled by user.");
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main().catch((err) => {
  console.error("❌ export_list failed:", err);
  process.exit(1);
});
