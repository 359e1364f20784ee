// scripts/scrape_hospitals.ts
// Scrape BC hospitals from the Wikipedia list page into a single CSV:
// every health authority's tables, bed counts from each hospital's infobox,
// coordinates from the table row or the hospital page.

import "dotenv/config";
import { loadScrapeConfig, parseScrapeArgs, USAGE, type ScrapeConfig } from "./config";
import { closeHttpSession, createHttpSession } from "./http";
import { EXIT_CODES, EXIT_FAILURE, reportScrapeResult, runHospitalScrape } from "./pipeline";
import { withErrorHandling } from "./validation";

function resolveConfig(): ScrapeConfig | null {
  try {
    const args = parseScrapeArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return null;
    }
    return loadScrapeConfig(args, process.env);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    console.error(USAGE);
    process.exit(EXIT_FAILURE);
  }
}

async function main() {
  const config = resolveConfig();
  if (!config) return;

  console.log(`\n🏗️  BC HOSPITALS SCRAPE`);
  console.log(`${"=".repeat(50)}`);
  console.log(`   Output: ${config.outPath}`);

  const session = createHttpSession({
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    connections: config.workers,
  });

  const result = await withErrorHandling(
    () => runHospitalScrape(config, session),
    "Hospital scrape"
  );
  await closeHttpSession(session);

  const code = reportScrapeResult(result);
  if (code !== EXIT_CODES.written) process.exit(code);
}

main().catch((err) => {
  console.error("❌ scrape_hospitals failed:", err);
  process.exit(EXIT_FAILURE);
});
