import { EXTRACTION_LIMITS } from "../config/jobs";
import { errorMessage, log, LogLevel } from "../utils/logger";
import { isAttributed, normalizeSpeaker, scoreBlock } from "./heuristics";
import type { SourceCatalog } from "./sourceCatalog";
import type {
  CharacterProfile,
  RawContent,
  ResolvedSource,
  SceneBlock,
  SceneCandidate
} from "./types";
import { formatEpisodeCode, parseEpisodeInfo } from "./utils";

export interface SceneExtractorOptions {
  mentionThreshold?: number;
  now?: () => Date;
}

/**
 * Turns fetched pages into scene candidates for one character, using the
 * strategy the catalog assigns to the page's source.
 */
export class SceneExtractor {
  private readonly mentionThreshold: number;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: SourceCatalog,
    options: SceneExtractorOptions = {}
  ) {
    this.mentionThreshold = options.mentionThreshold ?? EXTRACTION_LIMITS.MENTION_THRESHOLD;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scenes on the page that belong to the character. Never throws: a page
   * that cannot be parsed yields no candidates and a logged parse anomaly.
   */
  extract(raw: RawContent, character: CharacterProfile, source: ResolvedSource): SceneCandidate[] {
    try {
      const strategy = this.catalog.strategyFor(source.descriptor);
      const document = strategy.segment(raw, source);

      const { season, episode } = parseEpisodeInfo(`${document.title} ${raw.finalUrl}`);
      const extractedAt = this.now();

      const candidates = document.blocks
        .filter((block) => isAttributed(scoreBlock(block, character), this.mentionThreshold))
        .map((block) => this.toCandidate(block, character, source, raw, document.title, {
          season,
          episode,
          extractedAt
        }));

      log(
        LogLevel.DEBUG,
        "SceneExtractor",
        `${raw.finalUrl}: ${document.blocks.length} blocks, ${candidates.length} for ${character.key}`
      );
      return candidates;
    } catch (err: unknown) {
      log(
        LogLevel.WARN,
        "SceneExtractor",
        `Parse anomaly on ${raw.finalUrl} (${source.descriptor.id}): ${errorMessage(err)}`
      );
      return [];
    }
  }

  /** Transcript page URLs linked from an index page of the source */
  discoverLinks(raw: RawContent, source: ResolvedSource): string[] {
    try {
      return this.catalog.strategyFor(source.descriptor).discoverLinks(raw, source);
    } catch (err: unknown) {
      log(
        LogLevel.WARN,
        "SceneExtractor",
        `Parse anomaly reading links on ${raw.finalUrl}: ${errorMessage(err)}`
      );
      return [];
    }
  }

  private toCandidate(
    block: SceneBlock,
    character: CharacterProfile,
    source: ResolvedSource,
    raw: RawContent,
    title: string,
    meta: { season: number | null; episode: number | null; extractedAt: Date }
  ): SceneCandidate {
    const participants = new Map<string, string>();
    for (const turn of block.turns) {
      const key = normalizeSpeaker(turn.speaker);
      if (key && !participants.has(key)) {
        participants.set(key, turn.speaker.replace(/\([^)]*\)/g, "").trim());
      }
    }

    return {
      characterKey: character.key,
      show: source.show,
      season: meta.season,
      episode: meta.episode,
      episodeCode: formatEpisodeCode(meta.season, meta.episode),
      episodeTitle: title,
      sceneText: block.lines.join("\n"),
      dialogue: block.turns.map((turn) => ({ speaker: turn.speaker, line: turn.line })),
      location: block.location,
      participants: [...participants.values()],
      sourceUrl: raw.finalUrl || raw.url,
      extractedAt: meta.extractedAt
    };
  }
}
