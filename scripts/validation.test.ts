import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ListExtractionError } from "@/lib/errors";
import { summarize, validateList, validatePlace, withErrorHandling, writeValidationReport } from "./validation";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("validatePlace", () => {
  it("passes a complete place without warnings", () => {
    expect(validatePlace({ name: "Cafe", address: "1 Road", coordinates: { lat: 1, lon: 2 } })).toEqual({
      subject: "Cafe",
      isValid: true,
      errors: [],
      warnings: [],
    });
  });

  it("warns about missing coordinates and address", () => {
    expect(validatePlace({ name: "Spot" }).warnings).toEqual([
      "Missing coordinates (exported without a point)",
      "Missing address",
    ]);
  });
});

describe("validateList", () => {
  it("warns about an empty list", () => {
    expect(validateList({ name: "Empty", places: [] })).toEqual([
      { subject: "Empty", isValid: true, errors: [], warnings: ["List has no places"] },
    ]);
  });
});

describe("withErrorHandling", () => {
  it("returns the data on success", async () => {
    await expect(withErrorHandling(async () => 5, "Step")).resolves.toEqual({ success: true, data: 5, errors: [] });
  });

  it("captures the error and labels extraction failures with their kind", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const err = new ListExtractionError("SignatureNotFound", "shape changed");

    const result = await withErrorHandling(async () => {
      throw err;
    }, "List export");

    expect(result).toEqual({ success: false, error: err, errors: ["List export [SignatureNotFound]: shape changed"] });
    expect(consoleError).toHaveBeenCalledWith("❌ List export [SignatureNotFound] failed:", "shape changed");
  });

  it("reports failures through the given logger", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const err = new Error("offline");

    const result = await withErrorHandling(
      async () => {
        throw err;
      },
      "Fetch",
      logger
    );

    expect(result.errors).toEqual(["Fetch: offline"]);
    expect(logger.error).toHaveBeenCalledWith("Fetch failed:", err);
  });
});

describe("writeValidationReport", () => {
  it("writes the summary as JSON", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "maps-list-report-"));
    const reportPath = path.join(dir, "nested", "report.json");

    try {
      const results = validateList({ name: "L", places: [{ name: "A" }, { name: "B", address: "x", coordinates: { lat: 0, lon: 0 } }] });
      await writeValidationReport(reportPath, results, "Test");

      const written = JSON.parse(await fs.readFile(reportPath, "utf8"));
      expect(written).toMatchObject({ context: "Test", total_checks: 2, passed: 2, failed: 0, total_warnings: 2 });
      expect(written.details).toEqual(results);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("counts failed checks", () => {
    const summary = summarize(
      [{ subject: "x", isValid: false, errors: ["bad"], warnings: [] }],
      "ctx"
    );
    expect(summary).toMatchObject({ total_checks: 1, passed: 0, failed: 1, total_errors: 1 });
  });
});
