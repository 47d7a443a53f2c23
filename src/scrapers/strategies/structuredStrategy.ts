import * as cheerio from "cheerio";
import {
  matchInlineSpeaker,
  matchScreenplayCue,
  sceneBreak,
  scanLines
} from "../heuristics";
import type {
  DialogueTurn,
  ExtractionStrategy,
  ParsedDocument,
  RawContent,
  ResolvedSource,
  SceneBlock
} from "../types";
import { contentText, discoverLinksFromHtml, firstLine, looksLikeHtml, pageTitle } from "./base";

const BREAK_ELEMENTS = "hr, .scene-break, .scene-heading, .slugline";
const SPEAKER_ELEMENTS = "b, strong, .character, .speaker";

interface Draft {
  location: string | null;
  turns: DialogueTurn[];
  actions: string[];
  lines: string[];
}

function emptyDraft(location: string | null): Draft {
  return { location, turns: [], actions: [], lines: [] };
}

/**
 * Sites that mark scenes up explicitly: scene headings or <hr> separate
 * scenes, bold or upper-case elements name the speaker of the element(s)
 * that follow. Pages without any scene markup fall back to the line heuristic.
 */
export class StructuredMarkupStrategy implements ExtractionStrategy {
  readonly family = "structured" as const;

  discoverLinks(raw: RawContent, source: ResolvedSource): string[] {
    return discoverLinksFromHtml(raw, source);
  }

  segment(raw: RawContent, source: ResolvedSource): ParsedDocument {
    if (!looksLikeHtml(raw)) {
      return { title: firstLine(raw.body), blocks: scanLines(raw.body.split(/\r?\n/)) };
    }

    const $ = cheerio.load(raw.body);
    const title = pageTitle($, source.descriptor.titleSelector);

    const { contentSelector } = source.descriptor;
    let root = contentSelector ? $(contentSelector).first() : $("body");
    if (root.length === 0) root = $("body");

    const elements = root.children().toArray();
    const hasSceneMarkup = elements.some((el) => {
      const $el = $(el);
      return $el.is(BREAK_ELEMENTS) || sceneBreak($el.text().trim()) !== undefined;
    });

    if (!hasSceneMarkup) {
      const text = contentText($, contentSelector);
      return { title, blocks: scanLines(text.split(/\r?\n/)) };
    }

    const drafts: Draft[] = [];
    let draft = emptyDraft(null);
    let speaker: string | null = null;

    for (const el of elements) {
      const $el = $(el);
      const text = $el.text().replace(/\s+/g, " ").trim();

      if ($el.is(BREAK_ELEMENTS) || sceneBreak(text)) {
        drafts.push(draft);
        const heading = text ? sceneBreak(text) : undefined;
        draft = emptyDraft(heading ? heading.location : text || null);
        speaker = null;
        continue;
      }
      if (!text) continue;

      const inline = matchInlineSpeaker(text);
      if (inline) {
        draft.turns.push(inline);
        draft.lines.push(text);
        speaker = null;
        continue;
      }

      const bolded = $el.children(SPEAKER_ELEMENTS);
      const speakerMarkup =
        $el.is(SPEAKER_ELEMENTS) ||
        (bolded.length === 1 && bolded.text().replace(/\s+/g, " ").trim() === text);
      const cue =
        speakerMarkup && text.split(" ").length <= 4
          ? text.replace(/:$/, "").trim()
          : matchScreenplayCue(text);
      if (cue) {
        speaker = cue;
        draft.lines.push(text);
        continue;
      }

      if (speaker) {
        draft.turns.push({ speaker, line: text });
        speaker = null;
      } else {
        draft.actions.push(text);
      }
      draft.lines.push(text);
    }
    drafts.push(draft);

    const blocks: SceneBlock[] = drafts
      .filter((d) => d.turns.length > 0)
      .map((d) => ({
        location: d.location,
        turns: d.turns,
        context: d.actions,
        lines: d.lines
      }));

    return { title, blocks };
  }
}
