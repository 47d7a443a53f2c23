import type { SourceDescriptor } from "../scrapers/types";

const POLITE = { minDelayMs: 1_500, maxDelayMs: 4_000 };
const CAUTIOUS = { minDelayMs: 3_000, maxDelayMs: 8_000 };

export const TRANSCRIPT_SOURCES: SourceDescriptor[] = [
  {
    id: "springfield",
    name: "Springfield! Springfield!",
    family: "transcript",
    urlTemplate:
      "https://www.springfieldspringfield.co.uk/episode_scripts.php?tv-show={showSlug}",
    linkSelector: 'a[href*="view_episode_scripts"]',
    contentSelector: ".scrolling-script-container",
    titleSelector: "h1",
    rateLimit: POLITE,
    maxPages: 25
  },
  {
    id: "8flix",
    name: "8FLiX",
    family: "structured",
    urlTemplate: "https://8flix.com/search?q={showQuery}",
    linkSelector: 'a[href*="transcript"]',
    contentSelector: ".transcript-content, .content, article",
    titleSelector: "h1, .episode-title",
    rateLimit: CAUTIOUS,
    maxPages: 25
  },
  {
    id: "subslikescript",
    name: "Subslikescript",
    family: "transcript",
    urlTemplate: "https://subslikescript.com/search?q={showQuery}",
    linkSelector: 'a[href*="/series/"]',
    contentSelector: ".full-script",
    titleSelector: "h1",
    rateLimit: POLITE,
    maxPages: 25
  },
  {
    id: "foreverdreaming",
    name: "Forever Dreaming Transcripts",
    family: "transcript",
    urlTemplate:
      "https://transcripts.foreverdreaming.org/search.php?keywords={showQuery}",
    linkSelector: "a.topictitle",
    contentSelector: ".postbody .content",
    titleSelector: "h2.topic-title, h3",
    rateLimit: CAUTIOUS,
    maxPages: 25
  },
  {
    id: "scrapsfromtheloft",
    name: "Scraps from the Loft",
    family: "structured",
    urlTemplate: "https://scrapsfromtheloft.com/?s={showQuery}",
    linkSelector: "h2.entry-title a, h3.entry-title a",
    contentSelector: ".entry-content",
    titleSelector: "h1.entry-title",
    rateLimit: POLITE,
    maxPages: 15
  }
];
