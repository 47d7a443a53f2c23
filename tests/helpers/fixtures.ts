import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { RawContent } from "../../src/scrapers/types";

export function readFixture(name: string): string {
  return readFileSync(join(__dirname, "..", "fixtures", name), "utf8");
}

export function rawContent(body: string, overrides: Partial<RawContent> = {}): RawContent {
  const url = overrides.url ?? "https://transcripts.example.test/page";
  return {
    url,
    finalUrl: url,
    status: 200,
    contentType: "text/html; charset=utf-8",
    body,
    ...overrides
  };
}
