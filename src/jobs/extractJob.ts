import { createChallengeSolver } from "../clients/challengeSolver";
import { ProxyPool } from "../clients/proxyPool";
import { StealthFetchClient } from "../clients/stealthFetchClient";
import { TARGET_CHARACTERS } from "../config/characters";
import { loadConfig } from "../config/env";
import { TRANSCRIPT_SOURCES } from "../config/sources";
import { PgSceneRepository } from "../db/sceneRepository";
import { SceneExtractor } from "../scrapers/sceneExtractor";
import { SourceCatalog } from "../scrapers/sourceCatalog";
import { JobReporter, type RunReport } from "../services/jobReporter";
import { SceneStore } from "../services/sceneStore";
import { RawPageCache } from "../utils/rawPageCache";
import { runSentinelCheck } from "../utils/sentinel";
import { ExtractionOrchestrator } from "./orchestrator";

export interface ExtractionJobOptions {
  /** Character keys to run; empty means every configured character */
  characterKeys: string[];
  show?: string;
  concurrency?: number;
  maxPagesPerSource?: number;
  signal?: AbortSignal;
}

export function createCatalog(): SourceCatalog {
  return new SourceCatalog({ characters: TARGET_CHARACTERS, sources: TRANSCRIPT_SOURCES });
}

/**
 * Entry point for one extraction run: validates configuration, checks the
 * infrastructure, ensures the schema and drives the orchestrator.
 * @throws ConfigError or CatalogError on bad configuration, or when the database is unreachable
 */
export async function runExtractionJob(options: ExtractionJobOptions): Promise<RunReport> {
  const config = loadConfig();
  const catalog = createCatalog();

  const characterKeys =
    options.characterKeys.length > 0 ? options.characterKeys : catalog.characterKeys();
  // Fail on unknown characters before touching the network
  for (const key of characterKeys) catalog.character(key);

  const pool = new ProxyPool(config.proxyUrls);
  const solver = createChallengeSolver(config);
  await runSentinelCheck({ pool, solver });

  const store = new SceneStore(new PgSceneRepository());
  await store.ensureSchema();

  const client = new StealthFetchClient(pool, solver, {
    timeoutMs: config.fetchTimeoutMs,
    allowDirectFallback: config.allowDirectFallback
  });

  const cache = config.rawCachePath
    ? new RawPageCache({ filePath: config.rawCachePath, ttlMs: config.rawCacheTtlMs })
    : null;

  const orchestrator = new ExtractionOrchestrator(
    catalog,
    client,
    new SceneExtractor(catalog),
    store,
    new JobReporter(`extract-${process.pid}`),
    {
      concurrency: options.concurrency ?? config.concurrency,
      maxPagesPerSource: options.maxPagesPerSource,
      cache
    }
  );

  try {
    return await orchestrator.run({
      characterKeys,
      show: options.show,
      signal: options.signal
    });
  } finally {
    await client.close();
  }
}
