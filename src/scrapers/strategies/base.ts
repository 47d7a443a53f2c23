import * as cheerio from "cheerio";
import type { RawContent, ResolvedSource } from "../types";

export function looksLikeHtml(raw: RawContent): boolean {
  if (/html|xml/i.test(raw.contentType)) return true;
  return /<(?:html|body|div|p|br|article)\b/i.test(raw.body.slice(0, 4_096));
}

/**
 * Resolves every anchor matching the source's link selector to an absolute URL.
 * Duplicates and non-http links are dropped; document order is kept and the
 * list is capped at the source's maxPages.
 */
export function discoverLinksFromHtml(raw: RawContent, source: ResolvedSource): string[] {
  const { linkSelector, maxPages } = source.descriptor;
  if (!linkSelector) return [];

  const $ = cheerio.load(raw.body);
  const links: string[] = [];
  const seen = new Set<string>();

  $(linkSelector).each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;

    let absolute: URL;
    try {
      absolute = new URL(href, raw.finalUrl || raw.url);
    } catch {
      return;
    }
    if (absolute.protocol !== "http:" && absolute.protocol !== "https:") return;

    absolute.hash = "";
    const url = absolute.toString();
    if (seen.has(url)) return;

    seen.add(url);
    links.push(url);
  });

  return links.slice(0, maxPages);
}

const BLOCK_ELEMENTS = "p, div, li, h1, h2, h3, h4, h5, h6, tr, blockquote, pre";

/**
 * Text of the source's content element (the whole body when the selector is
 * missing or matches nothing), with <br> and block elements turned into line
 * breaks.
 */
export function contentText($: cheerio.CheerioAPI, contentSelector?: string): string {
  let root = contentSelector ? $(contentSelector).first() : $("body");
  if (root.length === 0) root = $("body");

  root.find("script, style, noscript").remove();
  root.find("br").replaceWith("\n");
  root.find(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append("\n");
  });

  return root.text();
}

/** Page title from the source's title selector, falling back to <title> */
export function pageTitle($: cheerio.CheerioAPI, titleSelector?: string): string {
  const fromSelector = titleSelector ? $(titleSelector).first().text().trim() : "";
  if (fromSelector) return fromSelector.replace(/\s+/g, " ");
  return $("title").first().text().trim().replace(/\s+/g, " ");
}

/** First non-empty line of a plain-text document */
export function firstLine(text: string): string {
  return (
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0) ?? ""
  );
}
