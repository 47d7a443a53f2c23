import { EXTRACTION_LIMITS } from "../config/jobs";
import type { RawContent } from "../scrapers/types";
import type { ChallengePayload, ChallengeType } from "./challengeSolver";

export type Classification =
  | { kind: "raw"; content: RawContent }
  | { kind: "challenged"; challenge: ChallengePayload; status: number }
  | { kind: "blocked"; reason: string; status: number }
  | { kind: "network_error"; message: string; status: number; retryable: boolean };

export interface ClassifiableResponse {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

// Checked in order; the first marker found decides the challenge type.
const CHALLENGE_MARKERS: Array<{ type: ChallengeType; pattern: RegExp }> = [
  { type: "turnstile", pattern: /cf-turnstile|challenges\.cloudflare\.com\/turnstile/i },
  { type: "hcaptcha", pattern: /h-captcha|hcaptcha\.com/i },
  { type: "recaptcha", pattern: /g-recaptcha|\/recaptcha\/api/i },
  {
    type: "cloudflare",
    pattern: /cf-chl|challenge-form|<title>\s*just a moment\.\.\.|cf_chl_opt/i
  }
];

const BLOCK_MARKERS =
  /access denied|request blocked|you have been blocked|forbidden|unusual traffic|rate limit(ed)?/i;

const BLOCK_STATUSES = new Set([401, 403, 407, 429, 451]);
const GONE_STATUSES = new Set([404, 410]);

// Block pages are short; a long page that mentions "forbidden" is just content.
const SMALL_BODY = 4_096;

function findSiteKey(body: string): string | null {
  const match = body.match(/data-sitekey=["']([^"']+)["']/i);
  return match ? match[1] : null;
}

/**
 * Sorts a response into content, challenge, block or network error using
 * challenge-page markers, status codes and body size.
 */
export function classifyResponse(
  response: ClassifiableResponse,
  minContentLength: number = EXTRACTION_LIMITS.MIN_CONTENT_LENGTH
): Classification {
  const { status, body } = response;

  for (const marker of CHALLENGE_MARKERS) {
    if (marker.pattern.test(body)) {
      return {
        kind: "challenged",
        status,
        challenge: {
          type: marker.type,
          pageUrl: response.finalUrl || response.url,
          siteKey: findSiteKey(body)
        }
      };
    }
  }

  if (BLOCK_STATUSES.has(status)) {
    return { kind: "blocked", reason: `HTTP ${status}`, status };
  }

  if (GONE_STATUSES.has(status)) {
    return {
      kind: "network_error",
      message: `HTTP ${status} for ${response.url}`,
      status,
      retryable: false
    };
  }

  if (status >= 400) {
    return {
      kind: "network_error",
      message: `HTTP ${status} for ${response.url}`,
      status,
      retryable: true
    };
  }

  if (body.length < SMALL_BODY && BLOCK_MARKERS.test(body)) {
    return { kind: "blocked", reason: "Block page served with success status", status };
  }

  if (body.trim().length < minContentLength) {
    return {
      kind: "blocked",
      reason: `Suspiciously short body (${body.trim().length} chars)`,
      status
    };
  }

  return {
    kind: "raw",
    content: {
      url: response.url,
      finalUrl: response.finalUrl || response.url,
      status,
      contentType: response.contentType,
      body
    }
  };
}
