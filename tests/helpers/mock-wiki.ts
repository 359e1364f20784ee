import { MockAgent } from "undici";
import { createHttpSession, type HttpSession } from "../../scripts/http";

export const WIKI_ORIGIN = "https://en.wikipedia.org";

export function wikiUrl(path: string) {
  return `${WIKI_ORIGIN}${path}`;
}

/** Session whose requests only ever reach the returned MockAgent. */
export function mockWikiSession(): { agent: MockAgent; session: HttpSession } {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const session = createHttpSession({
    userAgent: "test-agent",
    timeoutMs: 1_000,
    dispatcher: agent,
  });
  return { agent, session };
}

export function replyWith(agent: MockAgent, path: string, status: number, body = "") {
  agent.get(WIKI_ORIGIN).intercept({ path, method: "GET" }).reply(status, body);
}
