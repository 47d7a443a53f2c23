#!/usr/bin/env npx tsx

import { TEST_CHARACTER } from "../config/characters";
import { JOB_LIMITS } from "../config/jobs";
import { shutdownPool } from "../db/client";
import { runExtractionJob, type ExtractionJobOptions } from "../jobs/extractJob";
import { errorMessage } from "../utils/logger";

const USAGE = [
  "Usage:",
  "  extract --character <key> [--show <name>] [--concurrency <n>]",
  "  extract --all [--concurrency <n>]",
  "  extract --test"
].join("\n");

export type ParsedArgs =
  | { kind: "run"; options: Omit<ExtractionJobOptions, "signal"> }
  | { kind: "usage"; message: string };

/**
 * Reads `--flag value` and `--flag=value` forms. Unknown flags are usage errors.
 */
export function parseExtractArgs(argv: string[]): ParsedArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      return { kind: "usage", message: `Unexpected argument: ${arg}` };
    }

    const [flag, inline] = splitFlag(arg.slice(2));
    if (flag === "all" || flag === "test") {
      switches.add(flag);
      continue;
    }
    if (flag !== "character" && flag !== "show" && flag !== "concurrency") {
      return { kind: "usage", message: `Unknown option: --${flag}` };
    }

    const value = inline ?? argv[++i];
    if (value === undefined || value.startsWith("--") || value.trim() === "") {
      return { kind: "usage", message: `--${flag} needs a value` };
    }
    values.set(flag, value.trim());
  }

  let concurrency: number | undefined;
  const rawConcurrency = values.get("concurrency");
  if (rawConcurrency !== undefined) {
    concurrency = Number(rawConcurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      return { kind: "usage", message: `--concurrency must be a positive integer, got "${rawConcurrency}"` };
    }
  }

  const character = values.get("character");
  const modes = [character !== undefined, switches.has("all"), switches.has("test")].filter(Boolean);
  if (modes.length !== 1) {
    return { kind: "usage", message: "Choose exactly one of --character, --all or --test" };
  }

  if (switches.has("test")) {
    if (values.has("show")) {
      return { kind: "usage", message: "--show cannot be combined with --test" };
    }
    return {
      kind: "run",
      options: {
        characterKeys: [TEST_CHARACTER.key],
        show: TEST_CHARACTER.show,
        maxPagesPerSource: JOB_LIMITS.TEST_MAX_PAGES,
        concurrency
      }
    };
  }

  return {
    kind: "run",
    options: {
      characterKeys: character !== undefined ? [character] : [],
      show: values.get("show"),
      concurrency
    }
  };
}

function splitFlag(body: string): [string, string | undefined] {
  const eq = body.indexOf("=");
  return eq === -1 ? [body, undefined] : [body.slice(0, eq), body.slice(eq + 1)];
}

async function main() {
  const parsed = parseExtractArgs(process.argv.slice(2));
  if (parsed.kind === "usage") {
    console.error(`${parsed.message}\n\n${USAGE}`);
    process.exit(1);
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("\n🛑 Stop requested, letting in-flight attempts finish (Ctrl+C again to force)");
    controller.abort();
    process.once("SIGINT", () => process.exit(130));
  });

  const label = parsed.options.characterKeys.join(", ") || "all characters";

  try {
    console.log(
      "========================================\n",
      `🚀 Starting Extraction: ${label}`,
      "\n========================================"
    );
    await runExtractionJob({ ...parsed.options, signal: controller.signal });
    await shutdownPool();
    process.exit(0);
  } catch (err: unknown) {
    console.error(`💥 Fatal Job Error [${label}]: ${errorMessage(err)}`);
    await shutdownPool().catch((shutdownErr: unknown) => {
      console.error(`Pool shutdown failed: ${errorMessage(shutdownErr)}`);
    });
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
