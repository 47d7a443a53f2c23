import * as cheerio from "cheerio";
import { EXTRACTION_LIMITS } from "../../config/jobs";
import { matchInlineSpeaker } from "../heuristics";
import type {
  DialogueTurn,
  ExtractionStrategy,
  ParsedDocument,
  RawContent,
  ResolvedSource,
  SceneBlock
} from "../types";
import { contentText, discoverLinksFromHtml, looksLikeHtml, pageTitle } from "./base";

export interface SubtitleCue {
  start: number; // seconds
  end: number;
  lines: string[];
}

const TIMING =
  /^((?:\d{1,2}:)?\d{1,2}:\d{2}[,.]\d{1,3})\s*-->\s*((?:\d{1,2}:)?\d{1,2}:\d{2}[,.]\d{1,3})/;

function toSeconds(stamp: string): number {
  const [clock, fraction = "0"] = stamp.replace(",", ".").split(".");
  const parts = clock.split(":").map((part) => parseInt(part, 10));
  const [hours, minutes, seconds] = parts.length === 3 ? parts : [0, parts[0], parts[1]];
  return hours * 3600 + minutes * 60 + seconds + parseInt(fraction.padEnd(3, "0"), 10) / 1000;
}

function cleanCueLine(line: string): string {
  return line
    .replace(/<[^>]+>/g, "") // <i>, <font>
    .replace(/\{\\[^}]*\}/g, "") // {\an8}
    .trim();
}

/** Parses SRT or WebVTT text into timed cues; malformed cues are skipped. */
export function parseSubtitleCues(text: string): SubtitleCue[] {
  const cues: SubtitleCue[] = [];

  for (const chunk of text.replace(/\r\n?/g, "\n").split(/\n\s*\n/)) {
    const lines = chunk.split("\n").map((line) => line.trim());
    const timingIndex = lines.findIndex((line) => TIMING.test(line));
    if (timingIndex === -1) continue;

    const timing = lines[timingIndex].match(TIMING);
    if (!timing) continue;

    const cueLines = lines
      .slice(timingIndex + 1)
      .map(cleanCueLine)
      .filter((line) => line.length > 0);
    if (cueLines.length === 0) continue;

    cues.push({ start: toSeconds(timing[1]), end: toSeconds(timing[2]), lines: cueLines });
  }

  return cues;
}

/**
 * Subtitle files carry no scene markup; a silence longer than `sceneGapSeconds`
 * between two cues is taken as a cut. Lines are attributed when they use the
 * 'NAME: line' form, otherwise the speaker is left empty.
 */
export class SubtitleStrategy implements ExtractionStrategy {
  readonly family = "subtitle" as const;

  constructor(
    private readonly sceneGapSeconds: number = EXTRACTION_LIMITS.SUBTITLE_SCENE_GAP_SECONDS
  ) {}

  discoverLinks(raw: RawContent, source: ResolvedSource): string[] {
    if (!looksLikeHtml(raw)) return [];
    return discoverLinksFromHtml(raw, source);
  }

  segment(raw: RawContent, source: ResolvedSource): ParsedDocument {
    let text = raw.body;
    let title = decodeURIComponent(new URL(raw.finalUrl || raw.url).pathname.split("/").pop() ?? "");

    if (looksLikeHtml(raw)) {
      const $ = cheerio.load(raw.body);
      title = pageTitle($, source.descriptor.titleSelector) || title;
      text = contentText($, source.descriptor.contentSelector);
    }

    const groups: SubtitleCue[][] = [];
    for (const cue of parseSubtitleCues(text)) {
      const group = groups[groups.length - 1];
      const previous = group?.[group.length - 1];
      if (!group || !previous || cue.start - previous.end > this.sceneGapSeconds) {
        groups.push([cue]);
      } else {
        group.push(cue);
      }
    }

    const blocks: SceneBlock[] = groups.map((group) => {
      const lines = group.flatMap((cue) => cue.lines);
      const turns: DialogueTurn[] = lines.map(
        (line) => matchInlineSpeaker(line) ?? { speaker: "", line: line.replace(/^-\s*/, "") }
      );
      return { location: null, turns, context: [], lines };
    });

    return { title, blocks };
  }
}
