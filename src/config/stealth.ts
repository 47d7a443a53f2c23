export interface BrowserProfile {
  userAgent: string;

  // Client hints. Only Chromium sends them; null for Firefox and Safari.
  secChUa: string | null;
  secChUaPlatform: string | null;

  // Desktop profiles only: sites serve different layouts to mobile clients.
  mobile: false;
}

export const BROWSER_PROFILES: BrowserProfile[] = [
  {
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
    secChUa:
      '"Not/A)Brand";v="8", "Chromium";v="126", "Google Chrome";v="126"',
    secChUaPlatform: '"Windows"',
    mobile: false
  },
  {
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
    secChUa:
      '"Not/A)Brand";v="8", "Chromium";v="126", "Google Chrome";v="126"',
    secChUaPlatform: '"macOS"',
    mobile: false
  },
  {
    userAgent:
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36",
    secChUa:
      '"Google Chrome";v="125", "Chromium";v="125", "Not.A/Brand";v="24"',
    secChUaPlatform: '"Linux"',
    mobile: false
  },
  {
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36 Edg/126.0.0.0",
    secChUa:
      '"Not/A)Brand";v="8", "Chromium";v="126", "Microsoft Edge";v="126"',
    secChUaPlatform: '"Windows"',
    mobile: false
  },
  {
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0",
    secChUa: null,
    secChUaPlatform: null,
    mobile: false
  },
  {
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15",
    secChUa: null,
    secChUaPlatform: null,
    mobile: false
  }
];

// Common desktop resolutions, used for the viewport client hint.
export const VIEWPORTS: Array<{ width: number; height: number }> = [
  { width: 1920, height: 1080 },
  { width: 1536, height: 864 },
  { width: 1440, height: 900 },
  { width: 1366, height: 768 },
  { width: 1680, height: 1050 },
  { width: 2560, height: 1440 }
];

export const ACCEPT_LANGUAGES = [
  "en-US,en;q=0.9",
  "en-GB,en;q=0.9",
  "en-US,en;q=0.8,es;q=0.5",
  "en-CA,en;q=0.9,fr-CA;q=0.6"
];

export const DEVICE_MEMORY_GB = [4, 8, 16];

// Search-engine referers make a first page view look like a click-through.
export const REFERER_TEMPLATES = [
  "https://www.google.com/search?q={host}",
  "https://www.bing.com/search?q={host}",
  "https://duckduckgo.com/?q={host}"
];

export const BASE_HEADERS: Record<string, string> = {
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
  "Upgrade-Insecure-Requests": "1",
  "Sec-Fetch-Dest": "document",
  "Sec-Fetch-Mode": "navigate",
  "Sec-Fetch-Site": "cross-site",
  "Sec-Fetch-User": "?1"
};
