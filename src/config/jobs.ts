export const JOB_LIMITS = {
  DEFAULT_CONCURRENCY: 4,
  FETCH_TIMEOUT_MS: 30_000,
  // total fetch attempts per task, including the first
  MAX_FETCH_ATTEMPTS: 4,
  RETRY_BASE_DELAY_MS: 1_000,
  RETRY_MAX_DELAY_MS: 20_000,
  // pages taken from one source's index in --test mode
  TEST_MAX_PAGES: 1
} as const;

export const PROXY_LIMITS = {
  FAILURE_THRESHOLD: 3,
  BASE_COOLDOWN_MS: 30_000,
  MAX_COOLDOWN_MS: 15 * 60_000,
  // weight given to the latest outcome in the health moving average
  HEALTH_ALPHA: 0.3,
  MIN_WEIGHT: 0.05
} as const;

export const SOLVER_LIMITS = {
  SUBMIT_ATTEMPTS: 2,
  POLL_INTERVAL_MS: 5_000,
  MAX_POLLS: 24,
  TIMEOUT_MS: 120_000
} as const;

export const EXTRACTION_LIMITS = {
  MENTION_THRESHOLD: 2,
  CONTEXT_WINDOW: 3,
  MAX_UNATTRIBUTED_GAP: 2,
  SUBTITLE_SCENE_GAP_SECONDS: 6,
  MIN_CONTENT_LENGTH: 256
} as const;
