import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockAgent } from "undici";
import { LIST_URL, type ScrapeConfig } from "../../scripts/config";
import { closeHttpSession, type HttpSession } from "../../scripts/http";
import {
  EXIT_CODES,
  reportScrapeResult,
  runHospitalScrape,
  type ScrapeOutcome,
} from "../../scripts/pipeline";
import { withErrorHandling } from "../../scripts/validation";
import { mockWikiSession, replyWith } from "../helpers/mock-wiki";

const LIST_PATH = "/wiki/List_of_hospitals_in_British_Columbia";

const LISTING = `
  <div id="bodyContent">
    <h2>Island Health<span class="mw-editsection">[edit]</span></h2>
    <table class="wikitable">
      <tr><th>Facility</th><th>City</th></tr>
      <tr><td><a href="/wiki/Royal_Jubilee_Hospital">Royal Jubilee Hospital</a></td><td>Victoria</td></tr>
      <tr><td><a href="/wiki/Broken_Link_Hospital">Broken Link Hospital</a></td><td></td></tr>
    </table>
    <h2>Fraser Health<span class="mw-editsection">[edit]</span></h2>
    <table class="wikitable">
      <tr><th>Facility</th><th>City</th><th>Location</th></tr>
      <tr>
        <td><a href="/wiki/Surrey_Memorial_Hospital">Surrey Memorial Hospital</a></td>
        <td>Surrey</td>
        <td><span class="geo">49.1765; -122.8424</span></td>
      </tr>
      <tr><td>Surrey Memorial Hospital</td><td>Surrey</td><td></td></tr>
    </table>
  </div>
`;

const ROYAL_JUBILEE = `
  <a class="mw-kartographer-maplink" data-lat="48.4329" data-lon="-123.3266">map</a>
  <table class="infobox"><tr><th>Beds</th><td>500</td></tr></table>
`;

const SURREY_MEMORIAL = `
  <span class="geo">49.0; -122.0</span>
  <table class="infobox"><tr><th>Beds</th><td>650 (2019)</td></tr></table>
`;

describe("runHospitalScrape", () => {
  let agent: MockAgent;
  let session: HttpSession;
  let tmpDir: string;
  let config: ScrapeConfig;

  beforeEach(() => {
    ({ agent, session } = mockWikiSession());
    tmpDir = mkdtempSync(join(tmpdir(), "bc-hospitals-pipeline-"));
    config = {
      listUrl: LIST_URL,
      outPath: join(tmpDir, "out", "hospitals.csv"),
      workers: 2,
      delayMs: 0,
      timeoutMs: 1_000,
      userAgent: "test-agent",
    };
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await closeHttpSession(session);
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a deduplicated, sorted CSV from the listing and hospital pages", async () => {
    replyWith(agent, LIST_PATH, 200, LISTING);
    replyWith(agent, "/wiki/Royal_Jubilee_Hospital", 200, ROYAL_JUBILEE);
    replyWith(agent, "/wiki/Broken_Link_Hospital", 404);
    replyWith(agent, "/wiki/Surrey_Memorial_Hospital", 200, SURREY_MEMORIAL);

    const outcome = await runHospitalScrape(config, session, () => {});

    expect(outcome).toEqual({
      status: "written",
      outPath: config.outPath,
      rows: 3,
      withBeds: 2,
    });
    expect(readFileSync(config.outPath, "utf8").trimEnd().split("\n")).toEqual([
      "Health Authority,Facility Name,Location City,Latitude,Longitude,Beds,Beds Raw,Beds Source URL,Hospital Page URL",
      "Fraser Health,Surrey Memorial Hospital,Surrey,49.1765,-122.8424,650,650 (2019),https://en.wikipedia.org/wiki/Surrey_Memorial_Hospital,https://en.wikipedia.org/wiki/Surrey_Memorial_Hospital",
      "Island Health,Broken Link Hospital,,,,,,,https://en.wikipedia.org/wiki/Broken_Link_Hospital",
      "Island Health,Royal Jubilee Hospital,Victoria,48.4329,-123.3266,500,500,https://en.wikipedia.org/wiki/Royal_Jubilee_Hospital,https://en.wikipedia.org/wiki/Royal_Jubilee_Hospital",
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "[warn] GET https://en.wikipedia.org/wiki/Broken_Link_Hospital -> 404"
    );
  });

  it("stops when the listing page cannot be fetched", async () => {
    replyWith(agent, LIST_PATH, 503);

    const outcome = await runHospitalScrape(config, session, () => {});

    expect(outcome).toEqual({ status: "list_unreachable", listUrl: LIST_URL });
    expect(EXIT_CODES[outcome.status]).toBe(2);
    expect(existsSync(config.outPath)).toBe(false);
  });

  it("stops when the listing page has no facility rows", async () => {
    replyWith(agent, LIST_PATH, 200, "<html><body><h2>See also</h2></body></html>");

    const outcome = await runHospitalScrape(config, session, () => {});

    expect(outcome).toEqual({ status: "no_records", listUrl: LIST_URL });
    expect(EXIT_CODES[outcome.status]).toBe(3);
    expect(existsSync(config.outPath)).toBe(false);
  });
});

describe("reportScrapeResult", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs a crashed run once and exits 1", async () => {
    const result = await withErrorHandling<ScrapeOutcome>(async () => {
      throw new Error("disk full");
    }, "Hospital scrape");

    expect(reportScrapeResult(result)).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith("❌ Hospital scrape failed:", "disk full");
  });

  it("maps fatal outcomes to their exit codes", () => {
    expect(
      reportScrapeResult({ success: true, data: { status: "list_unreachable", listUrl: LIST_URL } })
    ).toBe(2);
    expect(console.error).toHaveBeenLastCalledWith(
      `Failed to load list page ${LIST_URL}. Aborting.`
    );

    expect(
      reportScrapeResult({ success: true, data: { status: "no_records", listUrl: LIST_URL } })
    ).toBe(3);
    expect(console.error).toHaveBeenLastCalledWith(
      `No tables parsed from list page ${LIST_URL}. Aborting.`
    );
  });

  it("reports the written file and exits 0", () => {
    const code = reportScrapeResult({
      success: true,
      data: { status: "written", outPath: "out.csv", rows: 1200, withBeds: 80 },
    });

    expect(code).toBe(0);
    expect(console.log).toHaveBeenLastCalledWith(
      "✅ Wrote out.csv with 1,200 rows (80 with bed counts)."
    );
    expect(console.error).not.toHaveBeenCalled();
  });
});
