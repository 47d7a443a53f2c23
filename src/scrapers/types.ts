import type { CharacterProfile } from "../config/characters";

export type StrategyFamily = "structured" | "subtitle" | "transcript";

export interface RateLimitHints {
  minDelayMs: number;
  maxDelayMs: number;
}

export interface SourceDescriptor {
  id: string;
  name: string;
  family: StrategyFamily;

  /**
   * Entry URL with `{show}`, `{showSlug}` and `{showQuery}` placeholders
   * (e.g. 'https://example.org/episode_scripts.php?tv-show={showSlug}')
   */
  urlTemplate: string;

  /** When set, the entry URL is an index page and matching anchors are the transcript pages */
  linkSelector?: string;

  /** Element holding the transcript body; the whole document when omitted */
  contentSelector?: string;
  titleSelector?: string;

  rateLimit: RateLimitHints;

  /** Cap on transcript pages taken from one index page */
  maxPages: number;
}

/** A descriptor bound to a show for one invocation */
export interface ResolvedSource {
  descriptor: SourceDescriptor;
  show: string;
  entryUrl: string;
}

export interface RawContent {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

export interface DialogueTurn {
  speaker: string;
  line: string;
}

/** A block of transcript found by a strategy, before the character filter */
export interface SceneBlock {
  location: string | null;
  turns: DialogueTurn[];
  /** Unattributed lines inside the block and the surrounding window */
  context: string[];
  /** The block's own lines as they appeared in the page */
  lines: string[];
}

export interface ParsedDocument {
  title: string;
  blocks: SceneBlock[];
}

export interface SceneCandidate {
  characterKey: string;
  show: string;
  season: number | null;
  episode: number | null;
  episodeCode: string;
  episodeTitle: string;
  sceneText: string;
  dialogue: DialogueTurn[];
  location: string | null;
  participants: string[];
  sourceUrl: string;
  extractedAt: Date;
}

export interface ExtractionStrategy {
  readonly family: StrategyFamily;

  /** Transcript page URLs linked from an index page, absolute and in document order */
  discoverLinks(raw: RawContent, source: ResolvedSource): string[];

  segment(raw: RawContent, source: ResolvedSource): ParsedDocument;
}

export type { CharacterProfile };
