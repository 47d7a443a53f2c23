import { SOLVER_LIMITS } from "../config/jobs";
import { fetchWithRetry } from "../utils/http";
import { errorMessage, log, LogLevel } from "../utils/logger";
import { sleep } from "../utils/retry";

export type ChallengeType = "recaptcha" | "hcaptcha" | "turnstile" | "cloudflare";

export interface ChallengePayload {
  type: ChallengeType;
  pageUrl: string;
  siteKey: string | null;
}

export type SolveResult =
  | {
      kind: "solved";
      token: string;
      cookies?: Record<string, string>;
      userAgent?: string;
    }
  | { kind: "unsolvable"; reason: string };

export interface ChallengeSolver {
  readonly enabled: boolean;
  solve(payload: ChallengePayload): Promise<SolveResult>;
  /** Throws when the service is unreachable or rejects the credentials */
  healthCheck(): Promise<void>;
}

/** Used when no solver credentials are configured. */
export class DisabledChallengeSolver implements ChallengeSolver {
  readonly enabled = false;

  async solve(payload: ChallengePayload): Promise<SolveResult> {
    return {
      kind: "unsolvable",
      reason: `No challenge solver configured (${payload.type} on ${payload.pageUrl})`
    };
  }

  async healthCheck(): Promise<void> {}
}

interface SolverApiResponse {
  status: number;
  request: string;
}

function isSolverApiResponse(value: unknown): value is SolverApiResponse {
  if (typeof value !== "object" || value === null) return false;
  return (
    "status" in value &&
    typeof value.status === "number" &&
    "request" in value &&
    typeof value.request === "string"
  );
}

export interface TwoCaptchaSolverOptions {
  apiKey: string;
  baseUrl?: string;
  submitAttempts?: number;
  pollIntervalMs?: number;
  maxPolls?: number;
  timeoutMs?: number;
}

const METHOD_BY_TYPE: Record<ChallengeType, string | null> = {
  recaptcha: "userrecaptcha",
  hcaptcha: "hcaptcha",
  turnstile: "turnstile",
  // An interstitial with no widget cannot be sent to a token service.
  cloudflare: null
};

/**
 * Adapter for a 2captcha-compatible solving service (in.php / res.php, JSON mode).
 * Submission gets a small fixed number of attempts and polling is bounded by
 * maxPolls and timeoutMs; every failure comes back as `unsolvable`.
 */
export class TwoCaptchaSolver implements ChallengeSolver {
  readonly enabled = true;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly submitAttempts: number;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;
  private readonly timeoutMs: number;

  constructor(options: TwoCaptchaSolverOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? "https://2captcha.com").replace(/\/+$/, "");
    this.submitAttempts = options.submitAttempts ?? SOLVER_LIMITS.SUBMIT_ATTEMPTS;
    this.pollIntervalMs = options.pollIntervalMs ?? SOLVER_LIMITS.POLL_INTERVAL_MS;
    this.maxPolls = options.maxPolls ?? SOLVER_LIMITS.MAX_POLLS;
    this.timeoutMs = options.timeoutMs ?? SOLVER_LIMITS.TIMEOUT_MS;
  }

  async solve(payload: ChallengePayload): Promise<SolveResult> {
    const method = METHOD_BY_TYPE[payload.type];
    if (!method) {
      return { kind: "unsolvable", reason: `Unsupported challenge type: ${payload.type}` };
    }
    if (!payload.siteKey) {
      return { kind: "unsolvable", reason: `No site key found on ${payload.pageUrl}` };
    }

    const deadline = AbortSignal.timeout(this.timeoutMs);

    try {
      const taskId = await this.submit(method, payload.siteKey, payload.pageUrl, deadline);
      log(LogLevel.INFO, "ChallengeSolver", `Submitted ${payload.type} task ${taskId}`);

      for (let poll = 1; poll <= this.maxPolls; poll++) {
        await sleep(this.pollIntervalMs, deadline);
        if (deadline.aborted) break;

        const response = await this.call(
          `${this.baseUrl}/res.php?${new URLSearchParams({
            key: this.apiKey,
            action: "get",
            id: taskId,
            json: "1"
          })}`,
          { method: "GET", signal: deadline }
        );

        if (response.status === 1) {
          return { kind: "solved", token: response.request };
        }
        if (response.request !== "CAPCHA_NOT_READY") {
          return { kind: "unsolvable", reason: `Solver error: ${response.request}` };
        }
      }

      return {
        kind: "unsolvable",
        reason: `Solver did not answer within ${this.maxPolls} polls / ${this.timeoutMs}ms`
      };
    } catch (err: unknown) {
      return { kind: "unsolvable", reason: errorMessage(err) };
    }
  }

  async healthCheck(): Promise<void> {
    const response = await this.call(
      `${this.baseUrl}/res.php?${new URLSearchParams({
        key: this.apiKey,
        action: "getbalance",
        json: "1"
      })}`,
      { method: "GET", signal: AbortSignal.timeout(10_000) }
    );
    if (response.status !== 1) {
      throw new Error(`Solver rejected credentials: ${response.request}`);
    }
  }

  private async submit(
    method: string,
    siteKey: string,
    pageUrl: string,
    signal: AbortSignal
  ): Promise<string> {
    const keyField = method === "userrecaptcha" ? "googlekey" : "sitekey";
    const body = new URLSearchParams({
      key: this.apiKey,
      method,
      [keyField]: siteKey,
      pageurl: pageUrl,
      json: "1"
    });

    const response = await this.call(
      `${this.baseUrl}/in.php`,
      { method: "POST", body, signal },
      this.submitAttempts
    );

    if (response.status !== 1) {
      throw new Error(`Solver rejected task: ${response.request}`);
    }
    return response.request;
  }

  private async call(
    url: string,
    init: RequestInit,
    maxAttempts = 1
  ): Promise<SolverApiResponse> {
    const res = await fetchWithRetry(url, init, {
      maxAttempts,
      baseDelayMs: 1_000,
      maxDelayMs: 4_000
    });
    const json: unknown = await res.json();

    if (!isSolverApiResponse(json)) {
      throw new Error(`Unexpected solver response from ${new URL(url).pathname}`);
    }
    return json;
  }
}

export function createChallengeSolver(config: {
  captchaApiKey: string | null;
  captchaApiUrl: string;
}): ChallengeSolver {
  if (!config.captchaApiKey) return new DisabledChallengeSolver();
  return new TwoCaptchaSolver({
    apiKey: config.captchaApiKey,
    baseUrl: config.captchaApiUrl
  });
}
