import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { RawContent } from "../scrapers/types";
import { errorMessage, log, LogLevel } from "./logger";

interface CachedPage {
  fetchedAt: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

interface PageArchive {
  schemaVersion: number;
  pages: Record<string, CachedPage>;
}

export interface RawPageCacheOptions {
  filePath: string;
  ttlMs: number;
}

const SCHEMA_VERSION = 1;

function isCachedPage(value: unknown): value is CachedPage {
  if (typeof value !== "object" || value === null) return false;
  return (
    "fetchedAt" in value &&
    typeof value.fetchedAt === "string" &&
    "finalUrl" in value &&
    typeof value.finalUrl === "string" &&
    "status" in value &&
    typeof value.status === "number" &&
    "contentType" in value &&
    typeof value.contentType === "string" &&
    "body" in value &&
    typeof value.body === "string"
  );
}

/**
 * File-backed cache of fetched pages, keyed by request URL. Entries older
 * than `ttlMs` are dropped on read and on load.
 */
export class RawPageCache {
  private readonly filePath: string;
  private readonly ttlMs: number;
  private loadPromise: Promise<void> | null = null;
  private pages = new Map<string, CachedPage>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    options: RawPageCacheOptions,
    private readonly now: () => number = Date.now
  ) {
    this.filePath = options.filePath;
    this.ttlMs = options.ttlMs;
  }

  async get(url: string): Promise<RawContent | null> {
    await this.loadIfNeeded();

    const cached = this.pages.get(url);
    if (!cached) return null;

    if (!this.isFresh(cached.fetchedAt)) {
      this.pages.delete(url);
      await this.persist();
      return null;
    }

    return {
      url,
      finalUrl: cached.finalUrl,
      status: cached.status,
      contentType: cached.contentType,
      body: cached.body
    };
  }

  async set(content: RawContent): Promise<void> {
    await this.loadIfNeeded();

    this.pages.set(content.url, {
      fetchedAt: new Date(this.now()).toISOString(),
      finalUrl: content.finalUrl,
      status: content.status,
      contentType: content.contentType,
      body: content.body
    });

    await this.persist();
  }

  private loadIfNeeded(): Promise<void> {
    if (!this.loadPromise) this.loadPromise = this.load();
    return this.loadPromise;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err: unknown) {
      log(LogLevel.DEBUG, "RawPageCache", `Starting empty (${errorMessage(err)})`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      log(LogLevel.WARN, "RawPageCache", `Ignoring unreadable cache file: ${errorMessage(err)}`);
      return;
    }

    if (
      typeof parsed !== "object" ||
      parsed === null ||
      !("schemaVersion" in parsed) ||
      parsed.schemaVersion !== SCHEMA_VERSION ||
      !("pages" in parsed) ||
      typeof parsed.pages !== "object" ||
      parsed.pages === null
    ) {
      return;
    }

    for (const [url, value] of Object.entries(parsed.pages)) {
      if (isCachedPage(value) && this.isFresh(value.fetchedAt)) {
        this.pages.set(url, value);
      }
    }
  }

  private isFresh(fetchedAt: string): boolean {
    const fetchedAtMs = Date.parse(fetchedAt);
    if (Number.isNaN(fetchedAtMs)) return false;
    return this.now() - fetchedAtMs <= this.ttlMs;
  }

  private async persist(): Promise<void> {
    const write = this.writeQueue.then(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      const archive: PageArchive = {
        schemaVersion: SCHEMA_VERSION,
        pages: Object.fromEntries(this.pages.entries())
      };
      await writeFile(this.filePath, JSON.stringify(archive), "utf8");
    });
    // A failed write must not poison later ones
    this.writeQueue = write.catch((err: unknown) => {
      log(LogLevel.WARN, "RawPageCache", `Could not write ${this.filePath}: ${errorMessage(err)}`);
    });
    await this.writeQueue;
  }
}
