import { promises as fs } from "node:fs";
import path from "node:path";
import { isListExtractionError } from "@/lib/errors";
import { createConsoleLogger } from "@/lib/log";
import type { Logger } from "@/lib/log";
import type { MapsListData, MapsPlace } from "@/lib/types";

// Shared validation utilities for the export pipeline

export interface ValidationResult {
  subject: string;
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ProcessingResult<T> {
  success: boolean;
  data?: T;
  error?: unknown;
  errors: string[];
}

/**
 * Flag places that will export with less than a full record.
 * Missing fields are warnings: the place is still exported.
 */
export function validatePlace(place: MapsPlace): ValidationResult {
  const result: ValidationResult = {
    subject: place.name,
    isValid: true,
    errors: [],
    warnings: [],
  };

  if (!place.coordinates) {
    result.warnings.push("Missing coordinates (exported without a point)");
  }
  if (!place.address || place.address.trim() === "") {
    result.warnings.push("Missing address");
  }

  return result;
}

export function validateList(list: MapsListData): ValidationResult[] {
  const results = list.places.map(validatePlace);
  if (list.places.length === 0) {
    results.unshift({
      subject: list.name,
      isValid: true,
      errors: [],
      warnings: ["List has no places"],
    });
  }
  return results;
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string,
  logger: Logger = createConsoleLogger(false)
): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return { success: true, data, errors: [] };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const label = isListExtractionError(error) ? `${context} [${error.kind}]` : context;
    logger.error(`${label} failed:`, error);

    return {
      success: false,
      error,
      errors: [`${label}: ${errorMessage}`],
    };
  }
}

export function summarize(results: ValidationResult[], context: string) {
  return {
    timestamp: new Date().toISOString(),
    context,
    total_checks: results.length,
    passed: results.filter((r) => r.isValid).length,
    failed: results.filter((r) => !r.isValid).length,
    total_errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    total_warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
    details: results,
  };
}

/**
 * Write validation report to file
 */
export async function writeValidationReport(
  reportPath: string,
  results: ValidationResult[],
  context: string
): Promise<void> {
  const summary = summarize(results, context);

  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2), "utf8");

  console.log(`📊 Validation report written to ${reportPath}`);
  console.log(`   ✅ ${summary.passed}/${summary.total_checks} checks passed`);
  if (summary.failed > 0) {
    console.log(`   ❌ ${summary.failed} checks failed`);
  }
  if (summary.total_warnings > 0) {
    console.log(`   ⚠️  ${summary.total_warnings} warnings`);
  }
}
