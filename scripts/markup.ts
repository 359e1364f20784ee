// scripts/markup.ts
// Locating the listing tables under a section heading

import type { Cheerio, CheerioAPI } from "cheerio";
import { hasChildren, isText, type AnyNode, type Element } from "domhandler";

export type RawTableRow = {
  row: Element;
  cells: Element[];
};

export function normalizeWhitespace(s: string) {
  return s.replace(/\s+/g, " ").trim();
}

function collectText(node: AnyNode, out: string[]) {
  if (isText(node)) {
    out.push(node.data);
  } else if (hasChildren(node)) {
    for (const child of node.children) collectText(child, out);
  }
}

/**
 * Text of a node with a space between adjacent text nodes, whitespace collapsed.
 * `<td><a>Royal Inland</a><br>Hospital</td>` -> "Royal Inland Hospital"
 */
export function cleanText(node: AnyNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return normalizeWhitespace(parts.join(" "));
}

export function headingTitle(heading: Element): string {
  return normalizeWhitespace(cleanText(heading).replace("[edit]", ""));
}

function isHeading(el: Element) {
  return el.tagName === "h2" || el.tagName === "h3";
}

/**
 * Every `table.wikitable` after the first h2/h3 whose title starts with
 * `headingText` (case-insensitive), up to the next h2/h3. Empty when no heading matches.
 */
export function tablesUnder($: CheerioAPI, headingText: string): Element[] {
  const body = $("#bodyContent").first();
  const scope: Cheerio<AnyNode> = body.length ? body : $.root();
  const needle = headingText.toLowerCase();

  // h2, h3 and tables in document order
  const nodes = scope.find("h2, h3, table").toArray();

  const start = nodes.findIndex(
    (el) => isHeading(el) && headingTitle(el).toLowerCase().startsWith(needle)
  );
  if (start === -1) return [];

  const tables: Element[] = [];
  for (const el of nodes.slice(start + 1)) {
    if (isHeading(el)) break;
    if ($(el).hasClass("wikitable")) tables.push(el);
  }
  return tables;
}

/** Data rows of a table: header rows (first cell is a th) and rows with fewer than 2 cells are skipped. */
export function tableRows($: CheerioAPI, table: Element): RawTableRow[] {
  const rows: RawTableRow[] = [];

  $(table)
    .find("tr")
    .each((_, tr) => {
      const cells = $(tr).children("td, th").toArray();
      if (cells.length < 2) return;
      if (cells[0].tagName === "th") return;
      rows.push({ row: tr, cells });
    });

  return rows;
}
