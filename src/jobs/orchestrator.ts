import pLimit from "p-limit";
import type { FetchResult, StealthFetchClient } from "../clients/stealthFetchClient";
import { JOB_LIMITS } from "../config/jobs";
import type { SceneExtractor } from "../scrapers/sceneExtractor";
import type { SourceCatalog } from "../scrapers/sourceCatalog";
import type { CharacterProfile, RawContent, ResolvedSource } from "../scrapers/types";
import type { FailureKind, JobReporter, RunReport } from "../services/jobReporter";
import type { SceneStore } from "../services/sceneStore";
import { errorMessage, LogLevel } from "../utils/logger";
import type { RawPageCache } from "../utils/rawPageCache";
import { backoffDelay, sleep } from "../utils/retry";

export type TaskState =
  | "pending"
  | "fetching"
  | "extracting"
  | "storing"
  | "done"
  | "failed"
  | "cancelled";

export interface ExtractionTask {
  id: number;
  characterKey: string;
  sourceId: string;
  url: string;
  kind: "index" | "page";
  state: TaskState;
  attempts: number;
}

export interface OrchestratorOptions {
  concurrency?: number;
  maxFetchAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Caps pages per source below the source's own maxPages, e.g. for test runs */
  maxPagesPerSource?: number;
  cache?: RawPageCache | null;
  random?: () => number;
}

export interface RunRequest {
  characterKeys: string[];
  /** Replaces the configured show name for this run only */
  show?: string;
  signal?: AbortSignal;
}

type Limit = ReturnType<typeof pLimit>;
type PageFetcher = Pick<StealthFetchClient, "createSession" | "fetch">;
type SceneSink = Pick<SceneStore, "upsert">;

type FailedFetch = Exclude<FetchResult, { kind: "raw" }>;

const ALLOWED: Record<TaskState, TaskState[]> = {
  pending: ["fetching", "failed", "cancelled"],
  fetching: ["fetching", "extracting", "failed", "cancelled"],
  extracting: ["storing", "done", "failed"],
  storing: ["done", "failed"],
  done: [],
  failed: [],
  cancelled: []
};

/**
 * Runs (character, source, page) tasks through fetch, extract and store on a
 * bounded worker pool. A task that fails is recorded and never affects its
 * siblings; a stop signal lets in-flight attempts finish and cancels the rest.
 */
export class ExtractionOrchestrator {
  private readonly concurrency: number;
  private readonly maxFetchAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly maxPagesPerSource: number | null;
  private readonly cache: RawPageCache | null;
  private readonly random: () => number;
  private readonly taskList: ExtractionTask[] = [];

  constructor(
    private readonly catalog: SourceCatalog,
    private readonly fetcher: PageFetcher,
    private readonly extractor: SceneExtractor,
    private readonly store: SceneSink,
    private readonly reporter: JobReporter,
    options: OrchestratorOptions = {}
  ) {
    this.concurrency = options.concurrency ?? JOB_LIMITS.DEFAULT_CONCURRENCY;
    this.maxFetchAttempts = options.maxFetchAttempts ?? JOB_LIMITS.MAX_FETCH_ATTEMPTS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? JOB_LIMITS.RETRY_BASE_DELAY_MS;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? JOB_LIMITS.RETRY_MAX_DELAY_MS;
    this.maxPagesPerSource = options.maxPagesPerSource ?? null;
    this.cache = options.cache ?? null;
    this.random = options.random ?? Math.random;
  }

  /**
   * Extracts and stores scenes for every requested character across all
   * configured sources. Unknown characters throw before any task starts.
   */
  async run(request: RunRequest): Promise<RunReport> {
    const characters = request.characterKeys.map((key) => this.catalog.character(key));
    const { signal } = request;
    const limit = pLimit(this.concurrency);

    const onAbort = () => this.reporter.markStopped();
    signal?.addEventListener("abort", onAbort, { once: true });

    this.reporter.startRun(characters.map((c) => c.key));

    try {
      const jobs: Promise<void>[] = [];
      for (const character of characters) {
        const sources = this.catalog.sourcesFor(character.key, { show: request.show });
        for (const source of sources) {
          jobs.push(this.runSource(limit, character, source, signal));
        }
      }
      await Promise.all(jobs);
    } catch (err: unknown) {
      this.reporter.finishRun(err instanceof Error ? err : new Error(String(err)));
      throw err;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    if (signal?.aborted) this.reporter.markStopped();
    return this.reporter.finishRun();
  }

  /** Snapshot of every task created so far */
  tasks(): ExtractionTask[] {
    return this.taskList.map((task) => ({ ...task }));
  }

  private async runSource(
    limit: Limit,
    character: CharacterProfile,
    source: ResolvedSource,
    signal: AbortSignal | undefined
  ): Promise<void> {
    let urls = [source.entryUrl];

    if (source.descriptor.linkSelector) {
      const index = this.createTask(character, source, source.entryUrl, "index");
      const links = await limit(() =>
        this.guard(index, () => this.runIndexTask(index, character, source, signal), null)
      );
      if (links === null) return;
      urls = links;
    }

    const pageTasks = urls.map((url) => this.createTask(character, source, url, "page"));
    await Promise.all(
      pageTasks.map((task) =>
        limit(() => this.guard(task, () => this.runPageTask(task, character, source, signal), undefined))
      )
    );
  }

  /** Task boundary: an unexpected throw fails this task only */
  private async guard<T>(task: ExtractionTask, body: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await body();
    } catch (err: unknown) {
      if (task.state === "done" || task.state === "failed" || task.state === "cancelled") {
        throw err;
      }
      const kind: FailureKind =
        task.state === "storing"
          ? "storage_error"
          : task.state === "extracting"
            ? "parse_anomaly"
            : "network_error";
      this.fail(task, kind, errorMessage(err));
      return fallback;
    }
  }

  private async runIndexTask(
    task: ExtractionTask,
    character: CharacterProfile,
    source: ResolvedSource,
    signal: AbortSignal | undefined
  ): Promise<string[] | null> {
    if (signal?.aborted) {
      this.cancel(task, "Stopped before start");
      return null;
    }

    const raw = await this.fetchWithRetries(task, character, source, signal);
    if (!raw) return null;

    this.transition(task, "extracting");
    const cap = Math.min(source.descriptor.maxPages, this.maxPagesPerSource ?? Infinity);
    const links = this.extractor.discoverLinks(raw, source).slice(0, cap);

    if (links.length === 0) {
      this.fail(task, "parse_anomaly", "No transcript links on index page");
      return null;
    }

    this.transition(task, "done");
    this.reporter.log(
      LogLevel.INFO,
      `${character.key} ${source.descriptor.id}: ${links.length} page(s) from index`
    );
    return links;
  }

  private async runPageTask(
    task: ExtractionTask,
    character: CharacterProfile,
    source: ResolvedSource,
    signal: AbortSignal | undefined
  ): Promise<void> {
    if (signal?.aborted) {
      this.cancel(task, "Stopped before start");
      return;
    }

    const raw = await this.fetchWithRetries(task, character, source, signal);
    if (!raw) return;

    this.transition(task, "extracting");
    const candidates = this.extractor.extract(raw, character, source);
    this.reporter.recordPage(character.key, candidates.length);

    if (candidates.length === 0) {
      this.transition(task, "done");
      return;
    }

    this.transition(task, "storing");
    try {
      // Each upsert is its own transaction: a scene is stored whole or not at all
      for (const candidate of candidates) {
        const outcome = await this.store.upsert(candidate);
        this.reporter.recordUpsert(character.key, outcome);
      }
      this.transition(task, "done");
    } catch (err: unknown) {
      this.fail(task, "storage_error", errorMessage(err));
    }
  }

  /**
   * Fetch loop with the task's retry budget. Blocked responses rotate the
   * session and exclude the proxy that was blocked. Returns null once the
   * failure has been recorded.
   */
  private async fetchWithRetries(
    task: ExtractionTask,
    character: CharacterProfile,
    source: ResolvedSource,
    signal: AbortSignal | undefined
  ): Promise<RawContent | null> {
    this.transition(task, "fetching");

    const cached = this.cache ? await this.cache.get(task.url) : null;
    if (cached) {
      this.reporter.log(LogLevel.DEBUG, `Cache hit: ${task.url}`);
      return cached;
    }

    let session = this.fetcher.createSession();
    const excluded = new Set<string>();
    let last: FailedFetch | null = null;

    while (task.attempts < this.maxFetchAttempts) {
      task.attempts++;
      const result = await this.fetcher.fetch(task.url, {
        characterKey: character.key,
        session,
        rateLimit: source.descriptor.rateLimit,
        excludeProxies: [...excluded]
      });

      if (result.kind === "raw") {
        if (this.cache) await this.cache.set(result.content);
        return result.content;
      }

      last = result;
      this.reporter.log(
        LogLevel.WARN,
        `${task.url} attempt ${task.attempts}/${this.maxFetchAttempts}: ${describe(result)}`
      );

      if (result.kind === "network_error" && !result.retryable) break;
      if (result.kind === "blocked") {
        session = this.fetcher.createSession();
        if (result.attempt.proxy) excluded.add(result.attempt.proxy);
      }
      if (task.attempts >= this.maxFetchAttempts) break;

      if (signal?.aborted) break;
      await sleep(
        backoffDelay(task.attempts, this.retryBaseDelayMs, this.retryMaxDelayMs, this.random),
        signal
      );
      if (signal?.aborted) break;
    }

    if (signal?.aborted && task.attempts < this.maxFetchAttempts && !isTerminal(last)) {
      this.cancel(task, `Stopped after ${task.attempts} attempt(s)`);
      return null;
    }

    const kind: FailureKind = last ? last.kind : "cancelled";
    this.fail(task, kind, last ? describe(last) : "No attempt made");
    return null;
  }

  private createTask(
    character: CharacterProfile,
    source: ResolvedSource,
    url: string,
    kind: ExtractionTask["kind"]
  ): ExtractionTask {
    const task: ExtractionTask = {
      id: this.taskList.length + 1,
      characterKey: character.key,
      sourceId: source.descriptor.id,
      url,
      kind,
      state: "pending",
      attempts: 0
    };
    this.taskList.push(task);
    return task;
  }

  private transition(task: ExtractionTask, next: TaskState): void {
    if (!ALLOWED[task.state].includes(next)) {
      throw new Error(`Task ${task.id} cannot move from ${task.state} to ${next}`);
    }
    if (task.state !== next) {
      this.reporter.log(LogLevel.DEBUG, `Task ${task.id} ${task.state} -> ${next} (${task.url})`);
    }
    task.state = next;
  }

  private fail(task: ExtractionTask, kind: FailureKind, message: string): void {
    this.transition(task, "failed");
    this.reporter.recordFailure({
      characterKey: task.characterKey,
      sourceId: task.sourceId,
      url: task.url,
      kind,
      message,
      attempts: task.attempts
    });
  }

  private cancel(task: ExtractionTask, message: string): void {
    this.transition(task, "cancelled");
    this.reporter.recordFailure({
      characterKey: task.characterKey,
      sourceId: task.sourceId,
      url: task.url,
      kind: "cancelled",
      message,
      attempts: task.attempts
    });
  }
}

function isTerminal(result: FailedFetch | null): boolean {
  return result !== null && result.kind === "network_error" && !result.retryable;
}

function describe(result: FailedFetch): string {
  switch (result.kind) {
    case "challenged":
      return `challenged (${result.challenge.type}): ${result.reason}`;
    case "blocked":
      return `blocked: ${result.reason}`;
    case "network_error":
      return `network error: ${result.message}`;
    case "resource_exhausted":
      return `resource exhausted: ${result.message}`;
  }
}
