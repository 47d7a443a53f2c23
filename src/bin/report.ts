#!/usr/bin/env npx tsx
import { shutdownPool } from "../db/client";
import { PgSceneRepository } from "../db/sceneRepository";
import type { SceneFilter, SceneRecord } from "../db/types";
import { SceneStore } from "../services/sceneStore";
import { errorMessage } from "../utils/logger";

const PREVIEW_LENGTH = 60;
const LIST_LIMIT = 200;

export function sceneRow(scene: SceneRecord): Record<string, string | number> {
  const firstLine = scene.sceneText.split("\n")[0] ?? "";
  return {
    Id: scene.id.slice(0, 12),
    Show: scene.show,
    Episode: scene.episodeCode || "?",
    Location: scene.location ?? "",
    Words: scene.wordCount,
    Preview: firstLine.length > PREVIEW_LENGTH ? `${firstLine.slice(0, PREVIEW_LENGTH - 1)}…` : firstLine
  };
}

const USAGE = "Usage: report [character] [episodeCode] [--show <name>] [--search <text>]";

export type ReportArgs =
  | { kind: "stats" }
  | { kind: "list"; filter: SceneFilter }
  | { kind: "usage"; message: string };

/**
 * No arguments prints per-character totals; anything else lists matching scenes.
 */
export function parseReportArgs(argv: string[]): ReportArgs {
  const positional: string[] = [];
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (flag !== "show" && flag !== "search") {
      return { kind: "usage", message: `Unknown option: --${flag}` };
    }

    const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
    if (value === undefined || value.startsWith("--") || value.trim() === "") {
      return { kind: "usage", message: `--${flag} needs a value` };
    }
    values.set(flag, value.trim());
  }

  if (positional.length > 2) {
    return { kind: "usage", message: `Unexpected argument: ${positional[2]}` };
  }

  const [characterKey, episodeCode] = positional;
  const show = values.get("show");
  const text = values.get("search");
  if (!characterKey && !show && !text) return { kind: "stats" };

  return {
    kind: "list",
    filter: {
      characterKey,
      episodeCode: episodeCode?.toUpperCase(),
      show,
      text,
      limit: LIST_LIMIT
    }
  };
}

function describeFilter(filter: SceneFilter): string {
  const parts = [
    filter.characterKey ? `for ${filter.characterKey}` : "",
    filter.show ? `in ${filter.show}` : "",
    filter.episodeCode ? `in ${filter.episodeCode}` : "",
    filter.text ? `matching "${filter.text}"` : ""
  ];
  return parts.filter(Boolean).join(" ");
}

async function main() {
  const args = parseReportArgs(process.argv.slice(2));
  if (args.kind === "usage") {
    console.error(`${args.message}\n\n${USAGE}`);
    process.exit(1);
  }

  const store = new SceneStore(new PgSceneRepository());

  try {
    if (args.kind === "stats") {
      const stats = await store.stats();
      if (stats.length === 0) {
        console.log("No scenes stored yet.");
      } else {
        console.table(
          stats.map((s) => ({
            Character: s.characterKey,
            Show: s.show,
            Scenes: s.scenes,
            Episodes: s.episodes,
            Words: s.words
          }))
        );
      }
    } else {
      const scenes = await store.query(args.filter);
      console.log(`${scenes.length} scene(s) ${describeFilter(args.filter)}`);
      if (scenes.length > 0) console.table(scenes.map(sceneRow));
    }
    await shutdownPool();
    process.exit(0);
  } catch (err: unknown) {
    console.error("💥 Command failed:", errorMessage(err));
    await shutdownPool().catch((shutdownErr: unknown) => {
      console.error(`Pool shutdown failed: ${errorMessage(shutdownErr)}`);
    });
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
