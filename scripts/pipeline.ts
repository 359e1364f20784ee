// scripts/pipeline.ts
// Listing page -> records -> hospital pages -> deduplicated, sorted CSV

import { assembleDataset, writeDataset } from "./assemble";
import type { ScrapeConfig } from "./config";
import { enrichWithHospitalPages } from "./enrich";
import { fetchPage, type HttpSession } from "./http";
import { parseListingPage } from "./listing";
import { logValidationSummary, validateHospitalRecord, type ProcessingResult } from "./validation";

export type ScrapeOutcome =
  | { status: "written"; outPath: string; rows: number; withBeds: number }
  | { status: "list_unreachable"; listUrl: string }
  | { status: "no_records"; listUrl: string };

export const EXIT_CODES = {
  written: 0,
  list_unreachable: 2,
  no_records: 3,
} as const satisfies Record<ScrapeOutcome["status"], number>;

// Usage errors and unexpected crashes
export const EXIT_FAILURE = 1;

export async function runHospitalScrape(
  config: ScrapeConfig,
  session: HttpSession,
  log: (message: string) => void = console.log
): Promise<ScrapeOutcome> {
  log(`\n📥 LISTING: ${config.listUrl}`);
  const listHtml = await fetchPage(config.listUrl, session);
  if (listHtml === null) {
    return { status: "list_unreachable", listUrl: config.listUrl };
  }

  const baseRecords = parseListingPage(listHtml, config.listUrl);
  log(`   Found ${baseRecords.length} facility rows.`);
  if (baseRecords.length === 0) {
    return { status: "no_records", listUrl: config.listUrl };
  }

  log(`\n🏥 HOSPITAL PAGES: ${config.workers} workers, ${config.delayMs}ms delay`);
  const enriched = await enrichWithHospitalPages(baseRecords, {
    session,
    workers: config.workers,
    delayMs: config.delayMs,
    log,
  });

  const dataset = assembleDataset(enriched);
  logValidationSummary(dataset.map(validateHospitalRecord), "Hospital record validation");

  const rows = await writeDataset(config.outPath, dataset);
  return {
    status: "written",
    outPath: config.outPath,
    rows,
    withBeds: dataset.filter((r) => r.beds !== null).length,
  };
}

/**
 * Prints the closing message for a run and returns its exit code.
 * A crashed run prints nothing more: `withErrorHandling` has already logged it.
 */
export function reportScrapeResult(result: ProcessingResult<ScrapeOutcome>): number {
  if (!result.success) return EXIT_FAILURE;

  const outcome = result.data;
  switch (outcome.status) {
    case "list_unreachable":
      console.error(`Failed to load list page ${outcome.listUrl}. Aborting.`);
      return EXIT_CODES.list_unreachable;
    case "no_records":
      console.error(`No tables parsed from list page ${outcome.listUrl}. Aborting.`);
      return EXIT_CODES.no_records;
    case "written":
      console.log(`\n${"=".repeat(50)}`);
      console.log(
        `✅ Wrote ${outcome.outPath} with ${outcome.rows.toLocaleString("en-US")} rows (${outcome.withBeds} with bed counts).`
      );
      return EXIT_CODES.written;
  }
}
