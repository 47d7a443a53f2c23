import { describe, expect, it, vi } from "vitest";
import {
  countWords,
  formatEpisodeCode,
  normalizeSceneText,
  parseEpisodeInfo,
  resolveUrlTemplate,
  slugify
} from "../../src/scrapers/utils";
import { backoffDelay, retryWithBackoff, sleep } from "../../src/utils/retry";

describe("slugify", () => {
  it("drops punctuation and joins words with hyphens", () => {
    expect(slugify("Better Call Saul!")).toBe("better-call-saul");
    expect(slugify(" The Office (US) ")).toBe("the-office-us");
    expect(slugify("Amélie")).toBe("amelie");
  });
});

describe("resolveUrlTemplate", () => {
  it("fills every placeholder", () => {
    const template = "https://scripts.example.test/{showSlug}?q={showQuery}&name={show}";
    expect(resolveUrlTemplate(template, "Game of Thrones")).toBe(
      "https://scripts.example.test/game-of-thrones?q=Game+of+Thrones&name=Game%20of%20Thrones"
    );
  });
});

describe("parseEpisodeInfo", () => {
  it.each([
    ["Succession S03E09 - All the Bells Say", { season: 3, episode: 9 }],
    ["Season 3, Episode 12", { season: 3, episode: 12 }],
    ["/transcripts/2x05-switch", { season: 2, episode: 5 }],
    ["Pilot", { season: null, episode: null }]
  ])("reads %s", (text, expected) => {
    expect(parseEpisodeInfo(text)).toEqual(expected);
  });
});

describe("formatEpisodeCode", () => {
  it("pads both numbers and needs both", () => {
    expect(formatEpisodeCode(2, 5)).toBe("S02E05");
    expect(formatEpisodeCode(2, null)).toBe("");
  });
});

describe("normalizeSceneText", () => {
  it("straightens quotes and collapses whitespace line by line", () => {
    const text = "  CHUCK:’Hi’  there \r\n\r\n JIMMY:  “Yo” ";
    expect(normalizeSceneText(text)).toBe("CHUCK:'Hi' there\nJIMMY: \"Yo\"");
  });

  it("counts words on the normalized text", () => {
    expect(countWords("  CHUCK:’Hi’  there \n JIMMY:  Yo ")).toBe(4);
    expect(countWords(" \n ")).toBe(0);
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    const noJitter = () => 0;
    expect(backoffDelay(1, 1_000, 20_000, noJitter)).toBe(1_000);
    expect(backoffDelay(3, 1_000, 20_000, noJitter)).toBe(4_000);
    expect(backoffDelay(10, 1_000, 20_000, noJitter)).toBe(20_000);
    expect(backoffDelay(1, 1_000, 20_000, () => 0.5)).toBe(1_050);
  });
});

describe("sleep", () => {
  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});

describe("retryWithBackoff", () => {
  it("retries until the call succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("reset"))
      .mockRejectedValueOnce(new Error("reset"))
      .mockResolvedValue("ok");

    await expect(retryWithBackoff(fn, { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up on errors the caller does not retry", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("bad request"));

    await expect(retryWithBackoff(fn, { shouldRetry: () => false })).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
