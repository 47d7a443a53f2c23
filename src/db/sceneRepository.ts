import { query, withTransaction } from "./client";
import type {
  CharacterSceneStats,
  SceneFilter,
  SceneRecord,
  SceneRepository,
  SceneRow,
  SceneTransaction,
  StoredVersion
} from "./types";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS scenes (
    id            CHAR(64) PRIMARY KEY,
    character_key TEXT NOT NULL,
    show          TEXT NOT NULL,
    season        INTEGER,
    episode       INTEGER,
    episode_code  TEXT NOT NULL DEFAULT '',
    episode_title TEXT NOT NULL DEFAULT '',
    scene_text    TEXT NOT NULL,
    dialogue      JSONB NOT NULL DEFAULT '[]'::jsonb,
    location      TEXT,
    participants  TEXT[] NOT NULL DEFAULT '{}',
    source_url    TEXT NOT NULL,
    word_count    INTEGER NOT NULL,
    content_hash  CHAR(64) NOT NULL,
    extracted_at  TIMESTAMPTZ NOT NULL
  );
  CREATE INDEX IF NOT EXISTS scenes_character_key_idx ON scenes (character_key);
  CREATE INDEX IF NOT EXISTS scenes_episode_code_idx ON scenes (episode_code);
`;

const COLUMNS = [
  "id",
  "character_key",
  "show",
  "season",
  "episode",
  "episode_code",
  "episode_title",
  "scene_text",
  "dialogue",
  "location",
  "participants",
  "source_url",
  "word_count",
  "content_hash",
  "extracted_at"
] as const;

function toParams(record: SceneRecord): unknown[] {
  return [
    record.id,
    record.characterKey,
    record.show,
    record.season,
    record.episode,
    record.episodeCode,
    record.episodeTitle,
    record.sceneText,
    JSON.stringify(record.dialogue),
    record.location,
    record.participants,
    record.sourceUrl,
    record.wordCount,
    record.contentHash,
    record.extractedAt.toISOString()
  ];
}

function fromRow(row: SceneRow): SceneRecord {
  return {
    id: row.id,
    characterKey: row.character_key,
    show: row.show,
    season: row.season,
    episode: row.episode,
    episodeCode: row.episode_code,
    episodeTitle: row.episode_title,
    sceneText: row.scene_text,
    dialogue: row.dialogue,
    location: row.location,
    participants: row.participants,
    sourceUrl: row.source_url,
    wordCount: row.word_count,
    contentHash: row.content_hash,
    extractedAt: row.extracted_at
  };
}

/** The part of a pg client the scene transaction uses */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export type TransactionRunner = <T>(fn: (client: SqlClient) => Promise<T>) => Promise<T>;

const pgTransaction: TransactionRunner = (fn) =>
  withTransaction((client) => fn({ query: (text, params) => client.query(text, params) }));

// Backslash is the default LIKE escape character in Postgres
function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, "\\$&");
}

function isVersionRow(row: unknown): row is { content_hash: string; source_url: string } {
  return (
    typeof row === "object" &&
    row !== null &&
    "content_hash" in row &&
    typeof row.content_hash === "string" &&
    "source_url" in row &&
    typeof row.source_url === "string"
  );
}

class PgSceneTransaction implements SceneTransaction {
  constructor(private readonly client: SqlClient) {}

  async insertIfAbsent(record: SceneRecord): Promise<boolean> {
    const placeholders = COLUMNS.map((_, i) => `$${i + 1}`).join(", ");
    const result = await this.client.query(
      `
      INSERT INTO scenes (${COLUMNS.join(", ")})
      VALUES (${placeholders})
      ON CONFLICT (id) DO NOTHING
      `,
      toParams(record)
    );
    return (result.rowCount ?? 0) > 0;
  }

  async lockExisting(id: string): Promise<StoredVersion | null> {
    const { rows } = await this.client.query(
      "SELECT content_hash, source_url FROM scenes WHERE id = $1 FOR UPDATE",
      [id]
    );
    const row = rows[0];
    return isVersionRow(row) ? { contentHash: row.content_hash, sourceUrl: row.source_url } : null;
  }

  async overwrite(record: SceneRecord): Promise<void> {
    const assignments = COLUMNS.slice(1)
      .map((column, i) => `${column} = $${i + 2}`)
      .join(",\n        ");
    await this.client.query(
      `
      UPDATE scenes
      SET
        ${assignments}
      WHERE id = $1
      `,
      toParams(record)
    );
  }
}

export class PgSceneRepository implements SceneRepository {
  constructor(private readonly runInTransaction: TransactionRunner = pgTransaction) {}

  /**
   * Creates the scenes table and its indexes when missing. Safe to run on
   * every start.
   */
  async ensureSchema(): Promise<void> {
    await query(SCHEMA);
  }

  async transaction<T>(fn: (tx: SceneTransaction) => Promise<T>): Promise<T> {
    return this.runInTransaction((client) => fn(new PgSceneTransaction(client)));
  }

  /**
   * Stored scenes matching the filter, ordered by show, season, episode and id.
   * Unknown seasons and episodes sort last.
   */
  async query(filter: SceneFilter): Promise<SceneRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.characterKey) {
      params.push(filter.characterKey);
      conditions.push(`character_key = $${params.length}`);
    }
    if (filter.show) {
      params.push(filter.show);
      conditions.push(`show = $${params.length}`);
    }
    if (filter.episodeCode) {
      params.push(filter.episodeCode);
      conditions.push(`episode_code = $${params.length}`);
    }
    if (filter.text) {
      params.push(`%${escapeLike(filter.text)}%`);
      conditions.push(`scene_text ILIKE $${params.length}`);
    }

    let sql = `SELECT * FROM scenes`;
    if (conditions.length > 0) sql += ` WHERE ${conditions.join(" AND ")}`;
    sql += ` ORDER BY show ASC, season ASC NULLS LAST, episode ASC NULLS LAST, id ASC`;
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const { rows } = await query<SceneRow>(sql, params);
    return rows.map(fromRow);
  }

  async stats(): Promise<CharacterSceneStats[]> {
    const { rows } = await query<{
      character_key: string;
      show: string;
      scenes: string;
      episodes: string;
      words: string | null;
    }>(
      `
      SELECT
        character_key,
        MIN(show) AS show,
        COUNT(*) AS scenes,
        COUNT(DISTINCT NULLIF(episode_code, '')) AS episodes,
        SUM(word_count) AS words
      FROM scenes
      GROUP BY character_key
      ORDER BY character_key ASC
      `
    );

    // COUNT and SUM come back from pg as bigint strings
    return rows.map((row) => ({
      characterKey: row.character_key,
      show: row.show,
      scenes: Number(row.scenes),
      episodes: Number(row.episodes),
      words: Number(row.words ?? 0)
    }));
  }
}
