import type {
  CharacterSceneStats,
  SceneFilter,
  SceneRecord,
  SceneRepository,
  SceneTransaction,
  StoredVersion
} from "../../src/db/types";

/**
 * In-process stand-in for the Postgres repository. Transactions run one at a
 * time, which gives the same serialization a row lock gives per id.
 */
export class MemorySceneRepository implements SceneRepository {
  readonly rows = new Map<string, SceneRecord>();
  writes = 0;
  failNextTransaction: Error | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  async ensureSchema(): Promise<void> {}

  transaction<T>(fn: (tx: SceneTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      if (this.failNextTransaction) {
        const err = this.failNextTransaction;
        this.failNextTransaction = null;
        throw err;
      }

      // Staged writes are applied on commit only
      const staged = new Map<string, SceneRecord>();
      const tx: SceneTransaction = {
        insertIfAbsent: async (record) => {
          if (this.rows.has(record.id) || staged.has(record.id)) return false;
          staged.set(record.id, structuredClone(record));
          return true;
        },
        lockExisting: async (id): Promise<StoredVersion | null> => {
          const row = staged.get(id) ?? this.rows.get(id);
          return row ? { contentHash: row.contentHash, sourceUrl: row.sourceUrl } : null;
        },
        overwrite: async (record) => {
          staged.set(record.id, structuredClone(record));
        }
      };

      const result = await fn(tx);
      for (const [id, record] of staged) {
        this.rows.set(id, record);
        this.writes++;
      }
      return result;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  async query(filter: SceneFilter): Promise<SceneRecord[]> {
    const sorted = [...this.rows.values()]
      .filter((row) => !filter.characterKey || row.characterKey === filter.characterKey)
      .filter((row) => !filter.show || row.show === filter.show)
      .filter((row) => !filter.episodeCode || row.episodeCode === filter.episodeCode)
      .filter((row) => !filter.text || row.sceneText.toLowerCase().includes(filter.text.toLowerCase()))
      .sort(
        (a, b) =>
          a.show.localeCompare(b.show) ||
          (a.season ?? Infinity) - (b.season ?? Infinity) ||
          (a.episode ?? Infinity) - (b.episode ?? Infinity) ||
          a.id.localeCompare(b.id)
      );
    return filter.limit === undefined ? sorted : sorted.slice(0, filter.limit);
  }

  async stats(): Promise<CharacterSceneStats[]> {
    const byCharacter = new Map<string, CharacterSceneStats & { codes: Set<string> }>();
    for (const row of this.rows.values()) {
      let entry = byCharacter.get(row.characterKey);
      if (!entry) {
        entry = { characterKey: row.characterKey, show: row.show, scenes: 0, episodes: 0, words: 0, codes: new Set() };
        byCharacter.set(row.characterKey, entry);
      }
      entry.scenes++;
      entry.words += row.wordCount;
      if (row.episodeCode) entry.codes.add(row.episodeCode);
    }
    return [...byCharacter.values()]
      .sort((a, b) => a.characterKey.localeCompare(b.characterKey))
      .map(({ codes, ...stats }) => ({ ...stats, episodes: codes.size }));
  }
}
