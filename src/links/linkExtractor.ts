export const DEFAULT_LINK_HOST = "github.com";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildLinkPattern(host: string = DEFAULT_LINK_HOST): RegExp {
  return new RegExp(`https?://${escapeRegExp(host)}/[^\\s,]+`, "g");
}

/**
 * Returns every `http(s)://<host>/...` link in `text`, in order of appearance.
 * A link ends at the first whitespace or comma. Duplicates are kept.
 */
export function extractLinks(text: string, host: string = DEFAULT_LINK_HOST): string[] {
  return text.match(buildLinkPattern(host)) ?? [];
}
