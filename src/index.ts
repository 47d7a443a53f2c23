export { ProxyPool, type ProxyRecord, type ProxyHandle } from "./clients/proxyPool";
export {
  createChallengeSolver,
  DisabledChallengeSolver,
  TwoCaptchaSolver,
  type ChallengeSolver,
  type ChallengePayload,
  type SolveResult
} from "./clients/challengeSolver";
export {
  StealthFetchClient,
  type FetchResult,
  type FetchAttempt,
  type StealthSession
} from "./clients/stealthFetchClient";
export { ConfigError, loadConfig, type AppConfig } from "./config/env";
export { PgSceneRepository } from "./db/sceneRepository";
export type { SceneRecord, SceneFilter, SceneRepository, CharacterSceneStats } from "./db/types";
export { runExtractionJob, createCatalog, type ExtractionJobOptions } from "./jobs/extractJob";
export { ExtractionOrchestrator, type RunRequest, type TaskState } from "./jobs/orchestrator";
export { SceneExtractor } from "./scrapers/sceneExtractor";
export { CatalogError, SourceCatalog } from "./scrapers/sourceCatalog";
export type { SceneCandidate, SourceDescriptor, CharacterProfile } from "./scrapers/types";
export { JobReporter, type RunReport, type FailureKind } from "./services/jobReporter";
export { SceneStore, sceneFingerprint, type UpsertOutcome } from "./services/sceneStore";
