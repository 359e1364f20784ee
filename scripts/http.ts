// scripts/http.ts

import { Agent, fetch, type Dispatcher } from "undici";

/** Connection pool, identification header and timeout shared by every fetch of one run. */
export type HttpSession = {
  dispatcher: Dispatcher;
  userAgent: string;
  timeoutMs: number;
};

type SessionOptions = {
  userAgent: string;
  timeoutMs: number;
  connections?: number;
  dispatcher?: Dispatcher;
};

export function createHttpSession(opts: SessionOptions): HttpSession {
  return {
    dispatcher: opts.dispatcher ?? new Agent({ connections: opts.connections ?? null }),
    userAgent: opts.userAgent,
    timeoutMs: opts.timeoutMs,
  };
}

export async function closeHttpSession(session: HttpSession): Promise<void> {
  await session.dispatcher.close();
}

function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici wraps the transport error ("fetch failed") and keeps the useful part in `cause`
  const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
  return `${err.message}${cause}`;
}

/**
 * GET one page. Any non-2xx status or transport failure is logged as a warning
 * and returned as null; no retries.
 */
export async function fetchPage(url: string, session: HttpSession): Promise<string | null> {
  try {
    const res = await fetch(url, {
      dispatcher: session.dispatcher,
      headers: {
        "User-Agent": session.userAgent,
        "Accept-Language": "en",
      },
      signal: AbortSignal.timeout(session.timeoutMs),
    });

    if (!res.ok) {
      console.warn(`[warn] GET ${url} -> ${res.status}`);
      await res.body?.cancel();
      return null;
    }

    return await res.text();
  } catch (err) {
    console.warn(`[warn] GET ${url} -> ${describeError(err)}`);
    return null;
  }
}
