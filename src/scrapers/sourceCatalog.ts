import type { CharacterProfile } from "../config/characters";
import { StructuredMarkupStrategy } from "./strategies/structuredStrategy";
import { SubtitleStrategy } from "./strategies/subtitleStrategy";
import { TranscriptStrategy } from "./strategies/transcriptStrategy";
import type {
  ExtractionStrategy,
  ResolvedSource,
  SourceDescriptor,
  StrategyFamily
} from "./types";
import { resolveUrlTemplate } from "./utils";

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export interface CatalogConfig {
  characters: CharacterProfile[];
  sources: SourceDescriptor[];
}

export interface SourceOverrides {
  show?: string;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function defaultStrategies(): Record<StrategyFamily, ExtractionStrategy> {
  return {
    structured: new StructuredMarkupStrategy(),
    subtitle: new SubtitleStrategy(),
    transcript: new TranscriptStrategy()
  };
}

/**
 * Read-only registry of target characters and transcript sources.
 * The configuration is copied and frozen on construction; per-run overrides
 * are applied to fresh copies and never reach shared state.
 */
export class SourceCatalog {
  private readonly characters: ReadonlyMap<string, CharacterProfile>;
  private readonly sources: readonly SourceDescriptor[];

  constructor(
    config: CatalogConfig,
    private readonly strategies: Record<StrategyFamily, ExtractionStrategy> = defaultStrategies()
  ) {
    const copy = deepFreeze(structuredClone(config));

    const characters = new Map<string, CharacterProfile>();
    for (const character of copy.characters) {
      if (characters.has(character.key)) {
        throw new CatalogError(`Duplicate character key: ${character.key}`);
      }
      characters.set(character.key, character);
    }

    const ids = new Set<string>();
    for (const source of copy.sources) {
      if (ids.has(source.id)) throw new CatalogError(`Duplicate source id: ${source.id}`);
      ids.add(source.id);
    }

    this.characters = characters;
    this.sources = copy.sources;
  }

  characterKeys(): string[] {
    return [...this.characters.keys()];
  }

  character(key: string): CharacterProfile {
    const character = this.characters.get(key);
    if (!character) {
      throw new CatalogError(
        `Unknown character: ${key}. Known characters: ${this.characterKeys().join(", ")}`
      );
    }
    return character;
  }

  /**
   * Every source bound to the character's show (or the override), with the
   * entry URL resolved.
   * @param characterKey - Key from the character configuration (e.g. 'chuck_mcgill')
   * @param overrides - Per-invocation replacements, e.g. a different show name to search for
   */
  sourcesFor(characterKey: string, overrides: SourceOverrides = {}): ResolvedSource[] {
    const character = this.character(characterKey);
    const show = overrides.show?.trim() || character.show;

    return this.sources.map((descriptor) => ({
      descriptor,
      show,
      entryUrl: resolveUrlTemplate(descriptor.urlTemplate, show)
    }));
  }

  strategyFor(descriptor: SourceDescriptor): ExtractionStrategy {
    return this.strategies[descriptor.family];
  }
}
