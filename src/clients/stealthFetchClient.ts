import { randomUUID } from "node:crypto";
import { EXTRACTION_LIMITS, JOB_LIMITS } from "../config/jobs";
import {
  ACCEPT_LANGUAGES,
  BASE_HEADERS,
  BROWSER_PROFILES,
  type BrowserProfile,
  DEVICE_MEMORY_GB,
  REFERER_TEMPLATES,
  VIEWPORTS
} from "../config/stealth";
import type { RateLimitHints, RawContent } from "../scrapers/types";
import { errorMessage, log, LogLevel } from "../utils/logger";
import { sleep } from "../utils/retry";
import type { ChallengePayload, ChallengeSolver, SolveResult } from "./challengeSolver";
import { type HttpTransport, UndiciTransport } from "./httpTransport";
import { type ProxyHandle, ProxyPool, redact } from "./proxyPool";
import { type Classification, classifyResponse } from "./responseClassifier";

/** Client identity kept for the lifetime of one task until it is rotated */
export interface StealthSession {
  id: string;
  profile: BrowserProfile;
  viewport: { width: number; height: number };
  acceptLanguage: string;
  deviceMemoryGb: number;
  doNotTrack: boolean;
  refererTemplate: string;
  cookies: Map<string, string>;
  requestCount: number;
}

export interface FetchContext {
  characterKey: string;
  session: StealthSession;
  rateLimit?: RateLimitHints;
  /** Proxies to skip for this attempt, e.g. the one that was just blocked */
  excludeProxies?: string[];
}

export type FetchOutcome =
  | "raw"
  | "challenged"
  | "blocked"
  | "network_error"
  | "resource_exhausted";

export interface FetchAttempt {
  url: string;
  proxy: string | null;
  sessionId: string;
  outcome: FetchOutcome;
  status: number | null;
  elapsedMs: number;
}

export type FetchResult =
  | { kind: "raw"; content: RawContent; attempt: FetchAttempt }
  | {
      kind: "challenged";
      challenge: ChallengePayload;
      reason: string;
      attempt: FetchAttempt;
    }
  | { kind: "blocked"; reason: string; attempt: FetchAttempt }
  | {
      kind: "network_error";
      message: string;
      retryable: boolean;
      attempt: FetchAttempt;
    }
  | { kind: "resource_exhausted"; message: string; attempt: FetchAttempt };

export interface StealthFetchClientOptions {
  transport?: HttpTransport;
  timeoutMs?: number;
  allowDirectFallback?: boolean;
  defaultJitter?: RateLimitHints;
  minContentLength?: number;
  random?: () => number;
}

const DEFAULT_JITTER: RateLimitHints = { minDelayMs: 250, maxDelayMs: 1_500 };

// Response field each widget posts back; appended to the re-issued request.
const TOKEN_FIELDS: Record<ChallengePayload["type"], string> = {
  recaptcha: "g-recaptcha-response",
  hcaptcha: "h-captcha-response",
  turnstile: "cf-turnstile-response",
  cloudflare: "cf_clearance"
};

export class StealthFetchClient {
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly allowDirectFallback: boolean;
  private readonly defaultJitter: RateLimitHints;
  private readonly minContentLength: number;
  private readonly random: () => number;

  constructor(
    private readonly pool: ProxyPool,
    private readonly solver: ChallengeSolver,
    options: StealthFetchClientOptions = {}
  ) {
    this.transport = options.transport ?? new UndiciTransport();
    this.timeoutMs = options.timeoutMs ?? JOB_LIMITS.FETCH_TIMEOUT_MS;
    this.allowDirectFallback = options.allowDirectFallback ?? true;
    this.defaultJitter = options.defaultJitter ?? DEFAULT_JITTER;
    this.minContentLength = options.minContentLength ?? EXTRACTION_LIMITS.MIN_CONTENT_LENGTH;
    this.random = options.random ?? Math.random;
  }

  /** A fresh, randomized client identity. */
  createSession(): StealthSession {
    return {
      id: randomUUID(),
      profile: this.pick(BROWSER_PROFILES),
      viewport: this.pick(VIEWPORTS),
      acceptLanguage: this.pick(ACCEPT_LANGUAGES),
      deviceMemoryGb: this.pick(DEVICE_MEMORY_GB),
      doNotTrack: this.random() < 0.5,
      refererTemplate: this.pick(REFERER_TEMPLATES),
      cookies: new Map(),
      requestCount: 0
    };
  }

  buildHeaders(session: StealthSession, url: string): Record<string, string> {
    const headers: Record<string, string> = {
      ...BASE_HEADERS,
      "User-Agent": session.profile.userAgent,
      "Accept-Language": session.acceptLanguage
    };

    if (session.profile.secChUa && session.profile.secChUaPlatform) {
      headers["Sec-CH-UA"] = session.profile.secChUa;
      headers["Sec-CH-UA-Mobile"] = session.profile.mobile ? "?1" : "?0";
      headers["Sec-CH-UA-Platform"] = session.profile.secChUaPlatform;
      headers["Sec-CH-Viewport-Width"] = String(session.viewport.width);
      headers["Viewport-Width"] = String(session.viewport.width);
      headers["Device-Memory"] = String(session.deviceMemoryGb);
    }

    if (session.doNotTrack) {
      headers["DNT"] = "1";
    }

    const { host, origin } = new URL(url);
    if (session.requestCount === 0) {
      headers["Referer"] = session.refererTemplate.replace("{host}", encodeURIComponent(host));
    } else {
      headers["Referer"] = `${origin}/`;
      headers["Sec-Fetch-Site"] = "same-origin";
    }

    if (session.cookies.size > 0) {
      headers["Cookie"] = [...session.cookies.entries()]
        .map(([name, value]) => `${name}=${value}`)
        .join("; ");
    }

    return headers;
  }

  /**
   * Retrieves one URL under the session's identity through a pooled proxy.
   * A challenge is handed to the solver and, when solved, the request is
   * re-issued once. The proxy outcome is reported exactly once per call.
   */
  async fetch(url: string, context: FetchContext): Promise<FetchResult> {
    const started = Date.now();
    const { session, characterKey } = context;

    await sleep(this.jitterMs(context.rateLimit ?? this.defaultJitter));

    let handle: ProxyHandle | null = null;
    if (this.pool.size > 0) {
      handle = this.pool.acquire({ exclude: context.excludeProxies });

      if (!handle && !this.allowDirectFallback) {
        return {
          kind: "resource_exhausted",
          message: "No eligible proxy and direct fallback is disabled",
          attempt: this.attempt(url, null, session, "resource_exhausted", null, started)
        };
      }
      if (!handle) {
        log(LogLevel.WARN, "StealthFetch", `No eligible proxy, fetching ${url} directly for ${characterKey}`);
      }
    }

    const proxy = handle ? handle.address : null;
    let classification = await this.request(url, characterKey, session, proxy);

    if (classification.kind === "challenged") {
      const solution = await this.trySolve(classification.challenge);

      if (solution.kind === "solved") {
        this.applySolution(session, solution);
        const retried = await this.request(
          withToken(url, TOKEN_FIELDS[classification.challenge.type], solution.token),
          characterKey,
          session,
          proxy
        );

        if (retried.kind !== "raw") {
          this.report(handle, false);
          return {
            kind: "challenged",
            challenge: classification.challenge,
            reason: `Still ${retried.kind} after solving ${classification.challenge.type}`,
            attempt: this.attempt(url, proxy, session, "challenged", retried.status, started)
          };
        }
        classification = retried;
      } else {
        this.report(handle, false);
        return {
          kind: "challenged",
          challenge: classification.challenge,
          reason: solution.reason,
          attempt: this.attempt(url, proxy, session, "challenged", classification.status, started)
        };
      }
    }

    switch (classification.kind) {
      case "raw":
        this.report(handle, true);
        return {
          kind: "raw",
          content: classification.content,
          attempt: this.attempt(url, proxy, session, "raw", classification.content.status, started)
        };
      case "blocked":
        this.report(handle, false);
        return {
          kind: "blocked",
          reason: classification.reason,
          attempt: this.attempt(url, proxy, session, "blocked", classification.status, started)
        };
      case "network_error":
        this.report(handle, false);
        return {
          kind: "network_error",
          message: classification.message,
          retryable: classification.retryable,
          attempt: this.attempt(
            url,
            proxy,
            session,
            "network_error",
            classification.status || null,
            started
          )
        };
    }
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private async request(
    url: string,
    characterKey: string,
    session: StealthSession,
    proxy: string | null
  ): Promise<Classification> {
    const headers = this.buildHeaders(session, url);
    session.requestCount++;

    try {
      const response = await this.transport.request(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
        proxyUrl: proxy
      });

      this.storeCookies(session, response.setCookies);

      return classifyResponse(
        {
          url,
          finalUrl: response.url,
          status: response.status,
          contentType: response.contentType,
          body: response.body
        },
        this.minContentLength
      );
    } catch (err: unknown) {
      const message =
        err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")
          ? `Timed out after ${this.timeoutMs}ms`
          : errorMessage(err);

      log(
        LogLevel.DEBUG,
        "StealthFetch",
        `${characterKey} ${url} via ${proxy ? redact(proxy) : "direct"} failed: ${message}`
      );
      return { kind: "network_error", message, status: 0, retryable: true };
    }
  }

  private async trySolve(challenge: ChallengePayload): Promise<SolveResult> {
    if (!this.solver.enabled) {
      return { kind: "unsolvable", reason: `${challenge.type} challenge and no solver configured` };
    }

    log(LogLevel.INFO, "StealthFetch", `Solving ${challenge.type} challenge on ${challenge.pageUrl}`);
    const solution = await this.solver.solve(challenge);
    if (solution.kind === "unsolvable") {
      log(LogLevel.WARN, "StealthFetch", `Challenge unsolved: ${solution.reason}`);
    }
    return solution;
  }

  private applySolution(
    session: StealthSession,
    solution: Extract<SolveResult, { kind: "solved" }>
  ): void {
    for (const [name, value] of Object.entries(solution.cookies ?? {})) {
      session.cookies.set(name, value);
    }
    if (solution.userAgent) {
      session.profile = { ...session.profile, userAgent: solution.userAgent };
    }
  }

  private storeCookies(session: StealthSession, setCookies: string[]): void {
    for (const header of setCookies) {
      const [pair] = header.split(";");
      const separator = pair.indexOf("=");
      if (separator <= 0) continue;
      session.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }

  private report(handle: ProxyHandle | null, success: boolean): void {
    if (handle) this.pool.reportOutcome(handle, success);
  }

  private attempt(
    url: string,
    proxy: string | null,
    session: StealthSession,
    outcome: FetchOutcome,
    status: number | null,
    started: number
  ): FetchAttempt {
    return {
      url,
      proxy,
      sessionId: session.id,
      outcome,
      status,
      elapsedMs: Date.now() - started
    };
  }

  private jitterMs(hints: RateLimitHints): number {
    const span = Math.max(hints.maxDelayMs - hints.minDelayMs, 0);
    return hints.minDelayMs + Math.floor(this.random() * span);
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length) % items.length];
  }
}

function withToken(url: string, field: string, token: string): string {
  const target = new URL(url);
  target.searchParams.set(field, token);
  return target.toString();
}
