import * as cheerio from "cheerio";

export const INIT_STATE_NAME = "window.APP_INITIALIZATION_STATE";

/** Text of the first `<script>` mentioning the initialization state, or null. */
export function findInitializationScript(html: string): string | null {
  const $ = cheerio.load(html);

  // Script bodies are raw text, so the serialized inner HTML is the source as written.
  const scripts = $("script")
    .map((_, el) => $(el).html() ?? "")
    .get();

  return scripts.find((text) => text.trim() !== "" && text.includes(INIT_STATE_NAME)) ?? null;
}
