import type { UpsertOutcome } from "./sceneStore";
import { log, LogLevel } from "../utils/logger";

export type FailureKind =
  | "network_error"
  | "challenged"
  | "blocked"
  | "parse_anomaly"
  | "persistence_conflict"
  | "resource_exhausted"
  | "storage_error"
  | "cancelled";

export interface TaskFailure {
  characterKey: string;
  sourceId: string;
  url: string;
  kind: FailureKind;
  message: string;
  attempts: number;
}

export interface CharacterReport {
  characterKey: string;
  pages: number;
  scenes: number;
  inserted: number;
  updated: number;
  unchanged: number;
  failed: number;
  cancelled: number;
}

export interface RunReport {
  label: string;
  status: "completed" | "completed_with_errors" | "stopped" | "failed";
  startedAt: Date;
  finishedAt: Date;
  characters: CharacterReport[];
  failures: TaskFailure[];
  errorSummary: string | null;
}

function emptyReport(characterKey: string): CharacterReport {
  return {
    characterKey,
    pages: 0,
    scenes: 0,
    inserted: 0,
    updated: 0,
    unchanged: 0,
    failed: 0,
    cancelled: 0
  };
}

/**
 * Collects per-character outcomes of one extraction run and prints the
 * end-of-run summary.
 */
export class JobReporter {
  private readonly counts = new Map<string, CharacterReport>();
  private readonly failures: TaskFailure[] = [];
  private startedAt: Date | null = null;
  private stopped = false;

  constructor(
    private readonly label: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Opens the run and registers every character so that characters without
   * any pages still show up in the summary.
   */
  startRun(characterKeys: string[]): void {
    this.startedAt = this.now();
    for (const key of characterKeys) this.entry(key);
    this.log(LogLevel.INFO, `Job started: ${this.label} (${characterKeys.join(", ")})`);
  }

  log(level: LogLevel, message: string): void {
    log(level, this.label, message);
  }

  recordPage(characterKey: string, scenes: number): void {
    const entry = this.entry(characterKey);
    entry.pages++;
    entry.scenes += scenes;
  }

  recordUpsert(characterKey: string, outcome: UpsertOutcome): void {
    this.entry(characterKey)[outcome]++;
  }

  recordFailure(failure: TaskFailure): void {
    const entry = this.entry(failure.characterKey);
    if (failure.kind === "cancelled") {
      entry.cancelled++;
    } else {
      entry.failed++;
      this.log(
        LogLevel.ERROR,
        `${failure.characterKey} ${failure.sourceId} ${failure.url} failed after ` +
          `${failure.attempts} attempt(s) [${failure.kind}]: ${failure.message}`
      );
    }
    this.failures.push(failure);
  }

  markStopped(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.log(LogLevel.WARN, "Stop requested; finishing in-flight attempts");
  }

  /**
   * Closes the run, prints the summary table and returns the final report.
   * @param error Set when the run ended on an unexpected exception
   */
  finishRun(error?: Error): RunReport {
    const finishedAt = this.now();
    const characters = [...this.counts.values()];

    let status: RunReport["status"] = "completed";
    if (error) {
      status = "failed";
      this.log(LogLevel.ERROR, `Fatal crash: ${error.message}`);
    } else if (this.stopped) {
      status = "stopped";
    } else if (characters.some((c) => c.failed > 0)) {
      status = "completed_with_errors";
    }

    const report: RunReport = {
      label: this.label,
      status,
      startedAt: this.startedAt ?? finishedAt,
      finishedAt,
      characters,
      failures: [...this.failures],
      errorSummary: error ? error.message : null
    };

    this.printFinalSummary(report);
    return report;
  }

  private entry(characterKey: string): CharacterReport {
    let entry = this.counts.get(characterKey);
    if (!entry) {
      entry = emptyReport(characterKey);
      this.counts.set(characterKey, entry);
    }
    return entry;
  }

  private printFinalSummary(report: RunReport): void {
    console.log(`\n${"=".repeat(40)}`);
    console.log(`JOB FINISHED: ${report.label} (${report.status})`);
    console.log(`${"=".repeat(40)}`);

    console.table(
      report.characters.map((c) => ({
        Character: c.characterKey,
        Pages: c.pages,
        Scenes: c.scenes,
        Inserted: c.inserted,
        Updated: c.updated,
        Unchanged: c.unchanged,
        Failed: c.failed,
        Cancelled: c.cancelled
      }))
    );

    console.log(`Duration: ${formatDuration(report.finishedAt.getTime() - report.startedAt.getTime())}`);
    if (report.errorSummary) {
      console.log(`\n❌ Error Detail: ${report.errorSummary}`);
    }
    console.log(`${"=".repeat(40)}\n`);
  }
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}
