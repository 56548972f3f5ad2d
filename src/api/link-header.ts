/**
 * Parse an RFC 8288 Link header as sent by Canvas:
 *   <https://host/api/v1/courses?page=2&per_page=100>; rel="next", <...>; rel="last"
 *
 * @returns Map of rel name to URL
 */
export function parseLinkHeader(header: string | null): Map<string, string> {
  const links = new Map<string, string>();
  if (!header) return links;

  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;(.*)/.exec(part.trim());
    if (!match) continue;

    const [, url, paramText] = match;
    const relMatch = /rel="?([^";]+)"?/i.exec(paramText);
    if (!relMatch) continue;

    // rel may hold several space-separated relation types
    for (const rel of relMatch[1].trim().split(/\s+/)) {
      if (!links.has(rel)) links.set(rel, url);
    }
  }

  return links;
}

export function nextPageUrl(header: string | null): string | null {
  return parseLinkHeader(header).get("next") ?? null;
}
