const URL_PATTERN = /https?:\/\/[^\s]+/g;

/**
 * All http(s) URLs in the text, first-seen order, without duplicates.
 */
export function parseUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN) ?? [];
  return Array.from(new Set(matches));
}

export function parseUrl(text: string): string | undefined {
  return parseUrls(text)[0];
}

/**
 * Replace every URL occurrence in one pass. `replacer` returning
 * undefined leaves that occurrence as it is.
 */
export function replaceUrls(text: string, replacer: (url: string) => string | undefined): string {
  return text.replace(URL_PATTERN, url => replacer(url) ?? url);
}
