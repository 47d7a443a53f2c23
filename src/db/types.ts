import type { DialogueTurn } from "../scrapers/types";

/** A stored scene as the application sees it */
export interface SceneRecord {
  id: string;
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
  wordCount: number;
  contentHash: string;
  extractedAt: Date;
}

/** Row shape of the `scenes` table */
export interface SceneRow {
  id: string;
  character_key: string;
  show: string;
  season: number | null;
  episode: number | null;
  episode_code: string;
  episode_title: string;
  scene_text: string;
  dialogue: DialogueTurn[]; // jsonb
  location: string | null;
  participants: string[];
  source_url: string;
  word_count: number;
  content_hash: string;
  extracted_at: Date;
}

export interface StoredVersion {
  contentHash: string;
  sourceUrl: string;
}

export interface SceneFilter {
  characterKey?: string;
  show?: string;
  episodeCode?: string;
  /** Case-insensitive substring of the scene text */
  text?: string;
  limit?: number;
}

export interface CharacterSceneStats {
  characterKey: string;
  show: string;
  scenes: number;
  episodes: number;
  words: number;
}

/** Operations available inside one upsert transaction */
export interface SceneTransaction {
  /** Inserts the record unless its id exists; true when a row was written */
  insertIfAbsent(record: SceneRecord): Promise<boolean>;
  /** Locks the stored row for the rest of the transaction */
  lockExisting(id: string): Promise<StoredVersion | null>;
  overwrite(record: SceneRecord): Promise<void>;
}

export interface SceneRepository {
  ensureSchema(): Promise<void>;
  transaction<T>(fn: (tx: SceneTransaction) => Promise<T>): Promise<T>;
  query(filter: SceneFilter): Promise<SceneRecord[]>;
  stats(): Promise<CharacterSceneStats[]>;
}
