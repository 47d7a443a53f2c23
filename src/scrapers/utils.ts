/**
 * Generates a URL-friendly slug from a show name.
 * Normalizes the name by removing accents and special characters.
 * @example
 * slugify('Better Call Saul!') // returns "better-call-saul"
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFD") // Handle accents/special chars
    .replace(/[\u0300-\u036f]/g, "") // Remove accents
    .replace(/[^a-z0-9\s-]/g, "") // Remove special characters
    .trim()
    .replace(/\s+/g, "-") // Replace spaces with hyphens
    .replace(/-+/g, "-"); // Remove double hyphens
}

/**
 * Fills the `{show}`, `{showSlug}` and `{showQuery}` placeholders of a source URL template.
 */
export function resolveUrlTemplate(template: string, show: string): string {
  return template
    .replaceAll("{showSlug}", slugify(show))
    .replaceAll("{showQuery}", encodeURIComponent(show.trim()).replace(/%20/g, "+"))
    .replaceAll("{show}", encodeURIComponent(show.trim()));
}

const EPISODE_PATTERNS = [
  /\bS(\d{1,2})\s*E(\d{1,3})\b/i,
  /\bSeason\s+(\d{1,2})\s*,?\s*Episode\s+(\d{1,3})\b/i,
  /\b(\d{1,2})x(\d{1,3})\b/i
];

/**
 * Pulls season and episode numbers out of a page title or URL.
 * Recognizes 'S02E05', 'Season 2 Episode 5' and '2x05'.
 */
export function parseEpisodeInfo(text: string): {
  season: number | null;
  episode: number | null;
} {
  for (const pattern of EPISODE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return { season: parseInt(match[1], 10), episode: parseInt(match[2], 10) };
    }
  }
  return { season: null, episode: null };
}

/** 'S02E05', or '' when either number is unknown */
export function formatEpisodeCode(season: number | null, episode: number | null): string {
  if (season === null || episode === null) return "";
  return `S${String(season).padStart(2, "0")}E${String(episode).padStart(2, "0")}`;
}

/**
 * Canonical form of scene text used for fingerprinting and word counts:
 * Unicode NFC, curly quotes straightened, whitespace inside each line collapsed,
 * blank lines dropped.
 */
export function normalizeSceneText(text: string): string {
  return text
    .normalize("NFC")
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

export function countWords(text: string): number {
  const normalized = normalizeSceneText(text);
  if (normalized.length === 0) return 0;
  return normalized.split(/\s+/).length;
}
