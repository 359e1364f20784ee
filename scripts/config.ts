// scripts/config.ts
// Defaults for the hospital scrape, overridable from .env and the command line

export const WIKI_BASE = "https://en.wikipedia.org";
export const LIST_URL = `${WIKI_BASE}/wiki/List_of_hospitals_in_British_Columbia`;

export const USER_AGENT =
  "bc-hospitals-map/0.1 (+research; contact: maintainer@example.com)";

export const DEFAULT_OUT_PATH = "bc_hospitals_from_wikipedia.csv";
export const DEFAULT_WORKERS = 10;
export const DEFAULT_DELAY_SECONDS = 0;
export const REQUEST_TIMEOUT_MS = 30_000;

export const USAGE = [
  "Usage: tsx scripts/scrape_hospitals.ts [--out <path>] [--workers <n>] [--delay <seconds>]",
  "",
  `  --out      Output CSV path (default: $HOSPITALS_CSV or ${DEFAULT_OUT_PATH})`,
  `  --workers  Concurrent requests for hospital pages (default: ${DEFAULT_WORKERS})`,
  `  --delay    Pause in seconds after each hospital page fetch, per worker (default: ${DEFAULT_DELAY_SECONDS})`,
  "  --help     Show this message",
].join("\n");

export type ScrapeConfig = {
  listUrl: string;
  outPath: string;
  workers: number;
  delayMs: number;
  timeoutMs: number;
  userAgent: string;
};

export type ScrapeArgs = {
  help: boolean;
  outPath?: string;
  workers?: number;
  delaySeconds?: number;
};

export type Env = Record<string, string | undefined>;

function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${flag} value: "${value}" (expected a positive integer)`);
  }
  return n;
}

function parseNonNegative(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new Error(`Invalid ${flag} value: "${value}" (expected a non-negative number)`);
  }
  return n;
}

export function parseScrapeArgs(argv: string[]): ScrapeArgs {
  const args: ScrapeArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (token === "--help" || token === "-h") {
      args.help = true;
      continue;
    }

    const eq = token.indexOf("=");
    const flag = eq >= 0 ? token.slice(0, eq) : token;

    if (!["--out", "--workers", "--delay"].includes(flag)) {
      throw new Error(`Unknown option: ${token}`);
    }

    let value: string;
    if (eq >= 0) {
      value = token.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Missing value for ${flag}`);
      }
      value = next;
      i++;
    }

    if (flag === "--out") {
      if (!value.trim()) throw new Error("Missing value for --out");
      args.outPath = value;
    } else if (flag === "--workers") {
      args.workers = parsePositiveInt(flag, value);
    } else {
      args.delaySeconds = parseNonNegative(flag, value);
    }
  }

  return args;
}

export function datasetPathFromEnv(env: Env): string {
  return env.HOSPITALS_CSV?.trim() || DEFAULT_OUT_PATH;
}

export function loadScrapeConfig(args: ScrapeArgs, env: Env): ScrapeConfig {
  const timeoutFromEnv = env.HOSPITALS_TIMEOUT_MS
    ? parsePositiveInt("HOSPITALS_TIMEOUT_MS", env.HOSPITALS_TIMEOUT_MS)
    : REQUEST_TIMEOUT_MS;

  return {
    listUrl: env.HOSPITALS_LIST_URL?.trim() || LIST_URL,
    outPath: args.outPath ?? datasetPathFromEnv(env),
    workers: args.workers ?? DEFAULT_WORKERS,
    delayMs: Math.round((args.delaySeconds ?? DEFAULT_DELAY_SECONDS) * 1000),
    timeoutMs: timeoutFromEnv,
    userAgent: env.HOSPITALS_USER_AGENT?.trim() || USER_AGENT,
  };
}
