/**
 * Field name supply for generated record types.
 *
 * Names come out in a fixed order ('a'…'z', 'aa'…'zz', 'aaa'…) so that the
 * same draw always names the same fields, which keeps shrunk counterexamples
 * reproducible. Reserved words are skipped: every name is a valid identifier.
 */

import reservedIdentifiers from './reserved-identifiers.json';

export const LOWERCASE_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

const RESERVED = new Set<string>([...reservedIdentifiers, '__proto__']);

export function isReservedIdentifier(name: string): boolean {
  return RESERVED.has(name);
}

/**
 * Infinite, restartable sequence of distinct field names.
 * Each call returns a fresh iterator starting from 'a'.
 */
export function* attributeNames(): Generator<string, never, undefined> {
  for (let length = 1; ; length += 1) {
    yield* namesOfLength(length);
  }
}

function* namesOfLength(length: number): Generator<string, void, undefined> {
  const last = LOWERCASE_ALPHABET.length - 1;
  const digits = new Array<number>(length).fill(0);

  for (;;) {
    const name = digits.map((d) => LOWERCASE_ALPHABET.charAt(d)).join('');
    if (!RESERVED.has(name)) {
      yield name;
    }

    let position = length - 1;
    while (position >= 0 && digits[position] === last) {
      digits[position] = 0;
      position -= 1;
    }
    if (position < 0) {
      return;
    }
    digits[position] += 1;
  }
}

/** First `count` names of the sequence, in order. */
export function takeNames(count: number): string[] {
  const names: string[] = [];
  if (count <= 0) {
    return names;
  }
  for (const name of attributeNames()) {
    names.push(name);
    if (names.length === count) {
      break;
    }
  }
  return names;
}

/**
 * How many names the sequence yields before its first name of `length`
 * characters.
 */
export function countNamesShorterThan(length: number): number {
  let total = 0;
  for (let size = 1; size < length; size += 1) {
    total += LOWERCASE_ALPHABET.length ** size;
  }
  let skipped = 0;
  for (const word of RESERVED) {
    if (word.length < length && /^[a-z]+$/.test(word)) {
      skipped += 1;
    }
  }
  return total - skipped;
}
