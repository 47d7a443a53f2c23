import { EXTRACTION_LIMITS } from "../config/jobs";
import type { CharacterProfile, DialogueTurn, SceneBlock } from "./types";

// 'CHUCK: line', 'Chuck (V.O.): line', '- Kim: line' (subtitle dash)
const INLINE_SPEAKER =
  /^(?:-\s*)?([A-Z][A-Za-z0-9.'\- ]{0,38}?)\s*(?:\([^)]{1,24}\))?\s*:\s+(\S.*)$/;

// '[Chuck] line'
const BRACKETED_SPEAKER = /^\[([A-Z][A-Za-z0-9.'\- ]{0,38})\]\s+(\S.*)$/;

// Screenplay cue: an upper-case name alone on its line, e.g. 'CHUCK' or 'CHUCK (CONT'D)'
const SCREENPLAY_CUE = /^([A-Z][A-Z0-9.'\- ]{0,30}?)\s*(?:\([^)]{1,24}\))?$/;

const SCENE_HEADING = /^(?:INT\.|EXT\.|INT\/EXT\.?|I\/E\.)\s*(.*)$/i;
const BRACKETED_SCENE = /^\[\s*scene\s*[:\-]?\s*([^\]]*)\]?$/i;
const SCENE_BREAK =
  /^(?:-{3,}|\*{3,}|={3,}|#{3,}|~{3,}|(?:cut to|fade in|fade out|dissolve to|smash cut to)\b.*)$/i;

// Colon-prefixed labels that are not speakers
const NON_SPEAKERS = new Set([
  "NOTE",
  "NOTES",
  "SCENE",
  "LOCATION",
  "TIME",
  "SETTING",
  "TRANSCRIPT",
  "WRITTEN BY",
  "DIRECTED BY",
  "TELEPLAY BY",
  "STORY BY",
  "EPISODE",
  "SEASON",
  "AIRED",
  "CAST",
  "SOURCE",
  "SUMMARY"
]);

const MAX_SPEAKER_WORDS = 4;

export interface LineScanOptions {
  contextWindow?: number;
  maxUnattributedGap?: number;
}

/** Scene heading text when the line opens a new scene, or undefined */
export function sceneBreak(line: string): { location: string | null } | undefined {
  const heading = line.match(SCENE_HEADING);
  if (heading) return { location: heading[0].trim() };

  const bracketed = line.match(BRACKETED_SCENE);
  if (bracketed) return { location: bracketed[1].trim() || null };

  if (SCENE_BREAK.test(line)) return { location: null };
  return undefined;
}

function isSpeakerName(name: string): boolean {
  const words = name.trim().split(/\s+/);
  if (words.length === 0 || words.length > MAX_SPEAKER_WORDS) return false;
  return !NON_SPEAKERS.has(name.trim().toUpperCase());
}

/** Speaker and line for 'NAME: line' or '[NAME] line' style attribution */
export function matchInlineSpeaker(line: string): DialogueTurn | undefined {
  const match = line.match(INLINE_SPEAKER) ?? line.match(BRACKETED_SPEAKER);
  if (!match) return undefined;

  const speaker = match[1].trim();
  if (!isSpeakerName(speaker)) return undefined;
  return { speaker, line: match[2].trim() };
}

/** Speaker name for a screenplay cue line */
export function matchScreenplayCue(line: string): string | undefined {
  if (line !== line.toUpperCase() || !/[A-Z]/.test(line)) return undefined;
  if (sceneBreak(line)) return undefined;

  const match = line.match(SCREENPLAY_CUE);
  if (!match) return undefined;

  const speaker = match[1].trim();
  return isSpeakerName(speaker) ? speaker : undefined;
}

interface OpenBlock {
  start: number;
  end: number;
  location: string | null;
  turns: DialogueTurn[];
  inside: string[];
  lines: string[];
}

/**
 * Generic boundary detection over plain transcript lines.
 *
 * Contiguous speaker-attributed lines form a block. Up to `maxUnattributedGap`
 * unattributed lines may sit between two turns of the same block; a longer
 * run, or a scene-break marker, closes it. Each block also carries up to
 * `contextWindow` lines on either side, never reaching past a scene break or
 * a neighbouring block.
 */
export function scanLines(rawLines: string[], options: LineScanOptions = {}): SceneBlock[] {
  const contextWindow = options.contextWindow ?? EXTRACTION_LIMITS.CONTEXT_WINDOW;
  const maxGap = options.maxUnattributedGap ?? EXTRACTION_LIMITS.MAX_UNATTRIBUTED_GAP;

  const lines = rawLines.map((line) => line.trim());
  const closed: OpenBlock[] = [];
  const barriers: number[] = [];

  let current: OpenBlock | null = null;
  let pendingLocation: string | null = null;
  let gap: string[] = [];
  let cueSpeaker: string | null = null;
  let pendingCue: string | null = null;
  let continuing = false;

  const close = () => {
    if (current && current.turns.length > 0) closed.push(current);
    current = null;
    gap = [];
  };

  const addTurn = (index: number, turn: DialogueTurn, text: string, merge: boolean) => {
    if (!current) {
      current = {
        start: index,
        end: index,
        location: pendingLocation,
        turns: [],
        inside: [],
        lines: []
      };
    } else if (gap.length > 0) {
      current.inside.push(...gap);
      current.lines.push(...gap);
    }
    gap = [];
    if (pendingCue) {
      current.lines.push(pendingCue);
      pendingCue = null;
    }

    const last = current.turns[current.turns.length - 1];
    if (merge && last && last.speaker === turn.speaker) {
      last.line = `${last.line} ${turn.line}`;
    } else {
      current.turns.push(turn);
    }
    current.lines.push(text);
    current.end = index;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (line === "") {
      cueSpeaker = null;
      continuing = false;
      continue;
    }

    const heading = sceneBreak(line);
    if (heading) {
      close();
      barriers.push(i);
      pendingLocation = heading.location;
      cueSpeaker = null;
      pendingCue = null;
      continuing = false;
      continue;
    }

    const inline = matchInlineSpeaker(line);
    if (inline) {
      cueSpeaker = null;
      continuing = false;
      addTurn(i, inline, line, false);
      continue;
    }

    const cue = matchScreenplayCue(line);
    const next = lines[i + 1] ?? "";
    const opensCue = cue !== undefined && next !== "" && !matchScreenplayCue(next) && !sceneBreak(next);

    // The first line after a cue is always dialogue; later ones may open the next cue
    if (cueSpeaker && !(continuing && opensCue)) {
      addTurn(i, { speaker: cueSpeaker, line }, line, continuing);
      continuing = true;
      continue;
    }

    if (cue && opensCue) {
      cueSpeaker = cue;
      pendingCue = line;
      continuing = false;
      continue;
    }

    if (current) {
      gap.push(line);
      if (gap.length > maxGap) close();
    }
  }
  close();

  return closed.map((block, index) => {
    const previousEnd = index > 0 ? closed[index - 1].end : -1;
    const nextStart = index < closed.length - 1 ? closed[index + 1].start : lines.length;
    const barrierBefore = Math.max(-1, ...barriers.filter((b) => b < block.start));
    const barrierAfter = Math.min(lines.length, ...barriers.filter((b) => b > block.end));

    const low = Math.max(previousEnd, barrierBefore, block.start - contextWindow - 1);
    const high = Math.min(nextStart, barrierAfter, block.end + contextWindow + 1);

    const before = lines.slice(low + 1, block.start).filter((line) => line !== "");
    const after = lines.slice(block.end + 1, high).filter((line) => line !== "");

    return {
      location: block.location,
      turns: block.turns,
      context: [...before, ...block.inside, ...after],
      lines: block.lines
    };
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function countMatches(terms: string[], texts: string[]): number {
  if (terms.length === 0) return 0;
  // Longest first so 'Lord Tywin' is counted once, not also as 'Tywin'
  const alternation = [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  const pattern = new RegExp(`(?<![A-Za-z])(?:${alternation})(?![A-Za-z])`, "gi");

  let count = 0;
  for (const text of texts) {
    count += text.match(pattern)?.length ?? 0;
  }
  return count;
}

/** Speaker label without parentheticals, upper-cased and single-spaced */
export function normalizeSpeaker(speaker: string): string {
  return speaker
    .replace(/\([^)]*\)/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();
}

/** True when the speaker is credited under one of the character's names */
export function speakerIsCharacter(speaker: string, character: CharacterProfile): boolean {
  const normalized = normalizeSpeaker(speaker);
  if (normalized === "") return false;

  return character.names.some((name) => {
    const alias = normalizeSpeaker(name);
    return normalized === alias || normalized.startsWith(`${alias} `);
  });
}

export interface AttributionScore {
  speaks: boolean;
  mentions: number;
  clues: number;
}

export function scoreBlock(block: SceneBlock, character: CharacterProfile): AttributionScore {
  const texts = [...block.turns.map((turn) => turn.line), ...block.context];
  return {
    speaks: block.turns.some((turn) => speakerIsCharacter(turn.speaker, character)),
    mentions: countMatches(character.names, texts),
    clues: countMatches(character.contextClues, texts)
  };
}

/**
 * A block belongs to the character when they speak in it, when their names
 * come up at least `mentionThreshold` times, or once alongside a context clue.
 */
export function isAttributed(
  score: AttributionScore,
  mentionThreshold: number = EXTRACTION_LIMITS.MENTION_THRESHOLD
): boolean {
  if (score.speaks) return true;
  if (score.mentions >= mentionThreshold) return true;
  return score.mentions >= 1 && score.clues >= 1;
}
