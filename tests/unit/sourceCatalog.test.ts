import { describe, expect, it } from "vitest";
import type { CharacterProfile } from "../../src/config/characters";
import { TARGET_CHARACTERS } from "../../src/config/characters";
import { TRANSCRIPT_SOURCES } from "../../src/config/sources";
import { CatalogError, SourceCatalog } from "../../src/scrapers/sourceCatalog";

describe("SourceCatalog", () => {
  it("resolves every source for the character's show", () => {
    const catalog = new SourceCatalog({ characters: TARGET_CHARACTERS, sources: TRANSCRIPT_SOURCES });
    const sources = catalog.sourcesFor("chuck_mcgill");

    expect(sources.map((s) => s.descriptor.id)).toEqual([
      "springfield",
      "8flix",
      "subslikescript",
      "foreverdreaming",
      "scrapsfromtheloft"
    ]);
    expect(sources[0].entryUrl).toBe(
      "https://www.springfieldspringfield.co.uk/episode_scripts.php?tv-show=better-call-saul"
    );
    expect(sources[1].entryUrl).toBe("https://8flix.com/search?q=Better+Call+Saul");
  });

  it("applies a show override to this call only", () => {
    const catalog = new SourceCatalog({ characters: TARGET_CHARACTERS, sources: TRANSCRIPT_SOURCES });

    const overridden = catalog.sourcesFor("chuck_mcgill", { show: "Breaking Bad" });
    const regular = catalog.sourcesFor("chuck_mcgill");

    expect(overridden[0].show).toBe("Breaking Bad");
    expect(overridden[0].entryUrl).toBe(
      "https://www.springfieldspringfield.co.uk/episode_scripts.php?tv-show=breaking-bad"
    );
    expect(regular[0].show).toBe("Better Call Saul");
    expect(catalog.character("chuck_mcgill").show).toBe("Better Call Saul");
  });

  it("is isolated from the configuration it was built from", () => {
    const characters: CharacterProfile[] = [
      { key: "kim_wexler", show: "Better Call Saul", names: ["Kim"], contextClues: [] }
    ];
    const catalog = new SourceCatalog({ characters, sources: TRANSCRIPT_SOURCES });

    characters[0].show = "Something Else";

    const kim = catalog.character("kim_wexler");
    expect(kim.show).toBe("Better Call Saul");
    expect(Object.isFrozen(kim)).toBe(true);
    expect(Object.isFrozen(catalog.sourcesFor("kim_wexler")[0].descriptor)).toBe(true);
  });

  it("rejects unknown characters and duplicate keys", () => {
    const catalog = new SourceCatalog({ characters: TARGET_CHARACTERS, sources: TRANSCRIPT_SOURCES });

    expect(() => catalog.sourcesFor("walter_white")).toThrow(CatalogError);
    expect(
      () =>
        new SourceCatalog({
          characters: [TARGET_CHARACTERS[0], TARGET_CHARACTERS[0]],
          sources: TRANSCRIPT_SOURCES
        })
    ).toThrow("Duplicate character key: tywin_lannister");
  });
});
