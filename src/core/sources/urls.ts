const URL_PATTERN = /https?:\/\/\S+/g;

export function extractUrls(...fields: Array<string | null | undefined>): string[] {
  const text = fields.filter((field): field is string => !!field).join(' ');
  return text.match(URL_PATTERN) ?? [];
}

// First occurrence wins, so the result follows bookmark order, then chat order.
export function dedupeUrls(...lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const list of lists) {
    for (const url of list) {
      if (seen.has(url)) continue;
      seen.add(url);
      result.push(url);
    }
  }

  return result;
}
