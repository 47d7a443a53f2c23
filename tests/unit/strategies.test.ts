import { describe, expect, it } from "vitest";
import { TARGET_CHARACTERS } from "../../src/config/characters";
import { TRANSCRIPT_SOURCES } from "../../src/config/sources";
import { SceneExtractor } from "../../src/scrapers/sceneExtractor";
import { SourceCatalog } from "../../src/scrapers/sourceCatalog";
import { StructuredMarkupStrategy } from "../../src/scrapers/strategies/structuredStrategy";
import { parseSubtitleCues, SubtitleStrategy } from "../../src/scrapers/strategies/subtitleStrategy";
import { TranscriptStrategy } from "../../src/scrapers/strategies/transcriptStrategy";
import type { ResolvedSource, SourceDescriptor } from "../../src/scrapers/types";
import { rawContent } from "../helpers/fixtures";

// Plain .srt/.vtt files listed on an index page
const SUBTITLE_SOURCE: SourceDescriptor = {
  id: "subtitles",
  name: "Subtitle files",
  family: "subtitle",
  urlTemplate: "https://subs.example.test/{showSlug}/",
  linkSelector: 'a[href$=".srt"], a[href$=".vtt"]',
  rateLimit: { minDelayMs: 0, maxDelayMs: 0 },
  maxPages: 10
};

const catalog = new SourceCatalog({
  characters: TARGET_CHARACTERS,
  sources: [...TRANSCRIPT_SOURCES, SUBTITLE_SOURCE]
});

function source(sourceId: string): ResolvedSource {
  const found = catalog.sourcesFor("logan_roy").find((s) => s.descriptor.id === sourceId);
  if (!found) throw new Error(`missing source ${sourceId}`);
  return found;
}

const BOARDROOM = `
<html><head><title>Succession 1x03 | Scraps</title></head><body>
<div class="entry-content">
  <p class="scene-heading">INT. WAYSTAR BOARDROOM - DAY</p>
  <p><b>LOGAN</b></p>
  <p>Sit down, all of you.</p>
  <p>KENDALL: Dad, we need to talk about the vote.</p>
  <p>The room goes quiet.</p>
  <hr>
  <p><strong>ROMAN</strong></p>
  <p>Is anyone getting lunch?</p>
</div></body></html>`;

const SUBTITLES = [
  "1",
  "00:00:01,000 --> 00:00:03,000",
  "LOGAN: Where is everyone?",
  "",
  "2",
  "00:00:03,500 --> 00:00:05,000",
  "- Upstairs, Dad.",
  "",
  "3",
  "00:00:20,000 --> 00:00:22,000",
  "<i>Traffic hums below.</i>",
  ""
].join("\n");

describe("StructuredMarkupStrategy", () => {
  it("splits on scene markup and reads bolded speakers", () => {
    const doc = new StructuredMarkupStrategy().segment(rawContent(BOARDROOM), source("scrapsfromtheloft"));

    expect(doc.title).toBe("Succession 1x03 | Scraps");
    expect(doc.blocks).toHaveLength(2);
    expect(doc.blocks[0]).toEqual({
      location: "INT. WAYSTAR BOARDROOM - DAY",
      turns: [
        { speaker: "LOGAN", line: "Sit down, all of you." },
        { speaker: "KENDALL", line: "Dad, we need to talk about the vote." }
      ],
      context: ["The room goes quiet."],
      lines: [
        "LOGAN",
        "Sit down, all of you.",
        "KENDALL: Dad, we need to talk about the vote.",
        "The room goes quiet."
      ]
    });
    expect(doc.blocks[1].location).toBeNull();
    expect(doc.blocks[1].turns).toEqual([{ speaker: "ROMAN", line: "Is anyone getting lunch?" }]);
  });

  it("keeps only the scene the character is in", () => {
    const extractor = new SceneExtractor(catalog);
    const scenes = extractor.extract(
      rawContent(BOARDROOM),
      catalog.character("logan_roy"),
      source("scrapsfromtheloft")
    );

    expect(scenes).toHaveLength(1);
    expect(scenes[0].episodeCode).toBe("S01E03");
    expect(scenes[0].participants).toEqual(["LOGAN", "KENDALL"]);
  });
});

describe("SubtitleStrategy", () => {
  it("parses WebVTT timings", () => {
    expect(parseSubtitleCues("WEBVTT\n\n00:01.000 --> 00:02.500\nHello there\n")).toEqual([
      { start: 1, end: 2.5, lines: ["Hello there"] }
    ]);
  });

  it("splits scenes on long silences", () => {
    const raw = rawContent(SUBTITLES, {
      url: "https://subs.example.test/succession/S01E03.srt",
      contentType: "application/x-subrip"
    });
    const doc = new SubtitleStrategy(6).segment(raw, source("subtitles"));

    expect(doc.title).toBe("S01E03.srt");
    expect(doc.blocks).toHaveLength(2);
    expect(doc.blocks[0].turns).toEqual([
      { speaker: "LOGAN", line: "Where is everyone?" },
      { speaker: "", line: "Upstairs, Dad." }
    ]);
    expect(doc.blocks[1].lines).toEqual(["Traffic hums below."]);
  });

  it("attributes subtitle scenes through the extractor", () => {
    const raw = rawContent(SUBTITLES, {
      url: "https://subs.example.test/succession/S01E03.srt",
      contentType: "application/x-subrip"
    });
    const scenes = new SceneExtractor(catalog).extract(raw, catalog.character("logan_roy"), source("subtitles"));

    expect(scenes).toHaveLength(1);
    expect(scenes[0].episodeCode).toBe("S01E03");
    expect(scenes[0].participants).toEqual(["LOGAN"]);
  });
});

describe("discoverLinks", () => {
  it("resolves, deduplicates and strips fragments in document order", () => {
    const index = `
      <html><body>
        <a href="/view_episode_scripts.php?tv-show=succession&amp;episode=s01e01">1</a>
        <a href="view_episode_scripts.php?tv-show=succession&amp;episode=s01e02#top">2</a>
        <a href="/view_episode_scripts.php?tv-show=succession&amp;episode=s01e01">again</a>
        <a href="/about">about</a>
      </body></html>`;
    const raw = rawContent(index, {
      url: "https://www.springfieldspringfield.co.uk/episode_scripts.php?tv-show=succession"
    });

    expect(new TranscriptStrategy().discoverLinks(raw, source("springfield"))).toEqual([
      "https://www.springfieldspringfield.co.uk/view_episode_scripts.php?tv-show=succession&episode=s01e01",
      "https://www.springfieldspringfield.co.uk/view_episode_scripts.php?tv-show=succession&episode=s01e02"
    ]);
  });
});
