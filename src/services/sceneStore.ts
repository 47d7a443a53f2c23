import { createHash } from "node:crypto";
import type {
  CharacterSceneStats,
  SceneFilter,
  SceneRecord,
  SceneRepository
} from "../db/types";
import type { SceneCandidate } from "../scrapers/types";
import { countWords, normalizeSceneText } from "../scrapers/utils";
import { log, LogLevel } from "../utils/logger";

export type UpsertOutcome = "inserted" | "updated" | "unchanged";

const UNIT_SEPARATOR = "\u001f";

/**
 * Stable scene identity: SHA-256 over the normalized text, the episode code
 * and the character key.
 */
export function sceneFingerprint(sceneText: string, episodeCode: string, characterKey: string): string {
  return createHash("sha256")
    .update([normalizeSceneText(sceneText), episodeCode, characterKey].join(UNIT_SEPARATOR))
    .digest("hex");
}

/**
 * Hash of the fields that come from the scene itself. Where the page was found
 * (source URL, episode title) and when it was extracted are left out, so two
 * sources serving the same scene agree on it.
 */
export function contentHash(
  record: Omit<SceneRecord, "id" | "extractedAt" | "contentHash" | "sourceUrl" | "episodeTitle">
): string {
  const fields = [
    record.characterKey,
    record.show,
    record.season,
    record.episode,
    record.episodeCode,
    record.sceneText,
    record.dialogue.map((turn) => [turn.speaker, turn.line]),
    record.location,
    record.participants,
    record.wordCount
  ];
  return createHash("sha256").update(JSON.stringify(fields)).digest("hex");
}

export function buildSceneRecord(candidate: SceneCandidate): SceneRecord {
  const sceneText = normalizeSceneText(candidate.sceneText);
  const participants = [...new Set(candidate.participants.filter((name) => name.trim() !== ""))].sort();

  const fields = {
    characterKey: candidate.characterKey,
    show: candidate.show,
    season: candidate.season,
    episode: candidate.episode,
    episodeCode: candidate.episodeCode,
    episodeTitle: candidate.episodeTitle,
    sceneText,
    dialogue: candidate.dialogue.map((turn) => ({ speaker: turn.speaker, line: turn.line })),
    location: candidate.location,
    participants,
    sourceUrl: candidate.sourceUrl,
    wordCount: countWords(sceneText)
  };

  return {
    id: sceneFingerprint(sceneText, candidate.episodeCode, candidate.characterKey),
    ...fields,
    contentHash: contentHash(fields),
    extractedAt: candidate.extractedAt
  };
}

/**
 * Persists scene candidates. Writes for one id are serialized by the
 * repository's row lock; re-storing identical content is a no-op.
 */
export class SceneStore {
  constructor(private readonly repo: SceneRepository) {}

  async ensureSchema(): Promise<void> {
    await this.repo.ensureSchema();
  }

  async upsert(candidate: SceneCandidate): Promise<UpsertOutcome> {
    const record = buildSceneRecord(candidate);

    return this.repo.transaction(async (tx) => {
      if (await tx.insertIfAbsent(record)) return "inserted";

      const existing = await tx.lockExisting(record.id);
      if (!existing) {
        // Deleted between the insert attempt and the lock
        return (await tx.insertIfAbsent(record)) ? "inserted" : "unchanged";
      }
      if (existing.contentHash === record.contentHash) return "unchanged";

      await tx.overwrite(record);
      log(
        LogLevel.WARN,
        "SceneStore",
        `Scene ${record.id.slice(0, 12)} re-extracted with different content; ` +
          `replacing version from ${existing.sourceUrl} with ${record.sourceUrl}`
      );
      return "updated";
    });
  }

  async query(filter: SceneFilter = {}): Promise<SceneRecord[]> {
    return this.repo.query(filter);
  }

  async stats(): Promise<CharacterSceneStats[]> {
    return this.repo.stats();
  }
}
