import { surrogateSafeIndex } from '../utils/text.js';

/**
 * Split text into chunks of at most `maxLength` characters, breaking on
 * `delimiter` where possible. A single word longer than `maxLength` is
 * hard-split, never between the halves of a surrogate pair.
 */
export function chunkOnDelimiter(text: string, maxLength: number, delimiter: string = ' '): string[] {
  if (maxLength < 1) {
    throw new RangeError('maxLength must be at least 1');
  }
  if (!text) {
    return [];
  }

  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    const trimmed = stripTrailing(current, delimiter);
    if (trimmed) {
      chunks.push(trimmed);
    }
  };

  for (const word of text.split(delimiter)) {
    if (current.length + word.length + delimiter.length <= maxLength) {
      current += word + delimiter;
      continue;
    }

    if (current) {
      flush();
    }

    if (word.length > maxLength) {
      let start = 0;
      while (start < word.length) {
        let end = surrogateSafeIndex(word, start + maxLength);
        if (end <= start) {
          // maxLength 1 against a surrogate pair: keep the pair together.
          end = start + 2;
        }
        chunks.push(word.slice(start, end));
        start = end;
      }
      current = '';
    } else {
      current = word + delimiter;
    }
  }

  if (current) {
    flush();
  }

  return chunks;
}

function stripTrailing(value: string, delimiter: string): string {
  if (!delimiter) {
    return value;
  }
  let end = value.length;
  while (end >= delimiter.length && value.slice(end - delimiter.length, end) === delimiter) {
    end -= delimiter.length;
  }
  return value.slice(0, end);
}
