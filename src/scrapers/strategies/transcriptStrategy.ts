import * as cheerio from "cheerio";
import { scanLines } from "../heuristics";
import type {
  ExtractionStrategy,
  ParsedDocument,
  RawContent,
  ResolvedSource
} from "../types";
import { contentText, discoverLinksFromHtml, firstLine, looksLikeHtml, pageTitle } from "./base";

/**
 * Wiki and fan-transcript sites: the page is one long run of 'NAME: line'
 * text, so segmentation is entirely the generic line heuristic.
 */
export class TranscriptStrategy implements ExtractionStrategy {
  readonly family = "transcript" as const;

  discoverLinks(raw: RawContent, source: ResolvedSource): string[] {
    return discoverLinksFromHtml(raw, source);
  }

  segment(raw: RawContent, source: ResolvedSource): ParsedDocument {
    if (!looksLikeHtml(raw)) {
      return { title: firstLine(raw.body), blocks: scanLines(raw.body.split(/\r?\n/)) };
    }

    const $ = cheerio.load(raw.body);
    const title = pageTitle($, source.descriptor.titleSelector);
    const text = contentText($, source.descriptor.contentSelector);

    return { title, blocks: scanLines(text.split(/\r?\n/)) };
  }
}
