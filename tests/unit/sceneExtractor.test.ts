import { describe, expect, it } from "vitest";
import { TARGET_CHARACTERS } from "../../src/config/characters";
import { TRANSCRIPT_SOURCES } from "../../src/config/sources";
import { SceneExtractor } from "../../src/scrapers/sceneExtractor";
import { SourceCatalog } from "../../src/scrapers/sourceCatalog";
import type { ExtractionStrategy, ResolvedSource } from "../../src/scrapers/types";
import { rawContent, readFixture } from "../helpers/fixtures";

const catalog = new SourceCatalog({ characters: TARGET_CHARACTERS, sources: TRANSCRIPT_SOURCES });
const extractedAt = new Date("2026-03-01T12:00:00Z");
const extractor = new SceneExtractor(catalog, { now: () => extractedAt });

function sourceFor(characterKey: string, sourceId: string): ResolvedSource {
  const source = catalog.sourcesFor(characterKey).find((s) => s.descriptor.id === sourceId);
  if (!source) throw new Error(`missing source ${sourceId}`);
  return source;
}

describe("SceneExtractor", () => {
  const chuck = catalog.character("chuck_mcgill");

  it("finds exactly the scene the character is in", () => {
    const raw = rawContent(readFixture("chuck-transcript.txt"), {
      url: "https://transcripts.example.test/better-call-saul/rebecca",
      contentType: "text/plain"
    });

    const scenes = extractor.extract(raw, chuck, sourceFor("chuck_mcgill", "foreverdreaming"));

    expect(scenes).toHaveLength(1);
    const [scene] = scenes;
    expect(scene.location).toBe("A dark living room lit by a single lantern");
    expect(scene.dialogue).toHaveLength(31);
    expect(scene.dialogue[0]).toEqual({
      speaker: "CHUCK",
      line: "Take the foil off the switch before you come any closer."
    });
    expect(scene.dialogue[30]).toEqual({
      speaker: "CHUCK",
      line: "Goodnight. Close the door gently on your way out."
    });
    expect(scene.participants).toEqual(["CHUCK", "JIMMY"]);
    expect(scene.sceneText.split("\n")).toHaveLength(31);
    expect(scene.sceneText).not.toContain("HOWARD");
    expect(scene).toMatchObject({
      characterKey: "chuck_mcgill",
      show: "Better Call Saul",
      season: 2,
      episode: 5,
      episodeCode: "S02E05",
      episodeTitle: "Better Call Saul S02E05 Rebecca",
      sourceUrl: "https://transcripts.example.test/better-call-saul/rebecca",
      extractedAt
    });
  });

  it("reads an HTML transcript through the content selector", () => {
    const html = `
      <html><head><title>Season 2 Episode 5 | Transcripts</title></head>
      <body>
        <nav>CHUCK: not part of the transcript</nav>
        <div class="postbody"><div class="content">
          [Scene: The courthouse steps]<br>
          CHUCK: The filing is due today.<br>
          JIMMY: I know.<br>
        </div></div>
      </body></html>`;

    const scenes = extractor.extract(
      rawContent(html),
      chuck,
      sourceFor("chuck_mcgill", "foreverdreaming")
    );

    expect(scenes).toHaveLength(1);
    expect(scenes[0].location).toBe("The courthouse steps");
    expect(scenes[0].episodeCode).toBe("S02E05");
    expect(scenes[0].dialogue).toEqual([
      { speaker: "CHUCK", line: "The filing is due today." },
      { speaker: "JIMMY", line: "I know." }
    ]);
  });

  it("returns no candidates when the strategy throws", () => {
    const broken: ExtractionStrategy = {
      family: "transcript",
      discoverLinks: () => {
        throw new Error("bad markup");
      },
      segment: () => {
        throw new Error("bad markup");
      }
    };
    const brokenCatalog = new SourceCatalog(
      { characters: TARGET_CHARACTERS, sources: TRANSCRIPT_SOURCES },
      { transcript: broken, structured: broken, subtitle: broken }
    );
    const fragile = new SceneExtractor(brokenCatalog);
    const source = sourceFor("chuck_mcgill", "springfield");

    expect(fragile.extract(rawContent("<p>x</p>"), chuck, source)).toEqual([]);
    expect(fragile.discoverLinks(rawContent("<p>x</p>"), source)).toEqual([]);
  });

  it("leaves episode fields empty when the page does not say", () => {
    const scenes = extractor.extract(
      rawContent("Pilot\n\nCHUCK: Hello.\n", { contentType: "text/plain" }),
      chuck,
      sourceFor("chuck_mcgill", "foreverdreaming")
    );

    expect(scenes).toHaveLength(1);
    expect(scenes[0]).toMatchObject({ season: null, episode: null, episodeCode: "", episodeTitle: "Pilot" });
  });
});
