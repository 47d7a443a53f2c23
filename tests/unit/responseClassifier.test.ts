import { describe, expect, it } from "vitest";
import { classifyResponse } from "../../src/clients/responseClassifier";

const LONG_TRANSCRIPT = `<html><body>${"<p>CHUCK: Sit down.</p>".repeat(40)}</body></html>`;

function response(body: string, status = 200) {
  return {
    url: "https://transcripts.example.test/page",
    finalUrl: "https://transcripts.example.test/page?ref=1",
    status,
    contentType: "text/html",
    body
  };
}

describe("classifyResponse", () => {
  it("passes real content through", () => {
    const result = classifyResponse(response(LONG_TRANSCRIPT), 256);
    expect(result.kind).toBe("raw");
    if (result.kind === "raw") {
      expect(result.content.finalUrl).toBe("https://transcripts.example.test/page?ref=1");
      expect(result.content.body).toBe(LONG_TRANSCRIPT);
    }
  });

  it("recognizes challenge widgets and their site keys", () => {
    const result = classifyResponse(
      response('<div class="cf-turnstile" data-sitekey="0x4AAA-test"></div>', 403)
    );
    expect(result).toEqual({
      kind: "challenged",
      status: 403,
      challenge: {
        type: "turnstile",
        pageUrl: "https://transcripts.example.test/page?ref=1",
        siteKey: "0x4AAA-test"
      }
    });
  });

  it("treats an interstitial without a widget as a cloudflare challenge", () => {
    const result = classifyResponse(response("<html><title>Just a moment...</title></html>", 503));
    expect(result).toMatchObject({ kind: "challenged", challenge: { type: "cloudflare", siteKey: null } });
  });

  it("maps blocking statuses to blocked", () => {
    expect(classifyResponse(response(LONG_TRANSCRIPT, 429))).toEqual({
      kind: "blocked",
      reason: "HTTP 429",
      status: 429
    });
  });

  it("does not retry pages that are gone", () => {
    expect(classifyResponse(response("", 404))).toEqual({
      kind: "network_error",
      message: "HTTP 404 for https://transcripts.example.test/page",
      status: 404,
      retryable: false
    });
    expect(classifyResponse(response("", 502))).toMatchObject({ kind: "network_error", retryable: true });
  });

  it("flags block pages and empty shells served with 200", () => {
    expect(classifyResponse(response("<h1>Access denied</h1>"))).toMatchObject({
      kind: "blocked",
      reason: "Block page served with success status"
    });
    expect(classifyResponse(response("  <html></html>  "), 256)).toEqual({
      kind: "blocked",
      reason: "Suspiciously short body (13 chars)",
      status: 200
    });
  });
});
