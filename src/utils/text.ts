const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/**
 * Largest cut position not after `index` that keeps surrogate pairs whole.
 */
export function surrogateSafeIndex(text: string, index: number): number {
  if (index <= 0 || index >= text.length) {
    return index;
  }
  return isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index)) ? index - 1 : index;
}

/**
 * First `maxUnits` UTF-16 units of `text`, one fewer when the cut would
 * split a surrogate pair.
 */
export function sliceWhole(text: string, maxUnits: number): string {
  return text.slice(0, surrogateSafeIndex(text, maxUnits));
}
