/**
 * Light suffix-stripping stemmer and tokenizer for rule matching
 */

// Longest suffixes first so "ments" wins over "s"
const SUFFIXES = ['ations', 'ation', 'ments', 'ment', 'ings', 'ing', 'ies', 'ied', 'ers', 'er', 'es', 'ed', 'ly', 's'];

const MIN_STEM_LENGTH = 3;

function undouble(base: string): string {
  // running -> runn -> run, but keep "ll", "ss", "zz" (install, access)
  if (/([bcdfghjkmnpqrtvwxy])\1$/.test(base)) {
    return base.slice(0, -1);
  }
  return base;
}

export function stem(word: string): string {
  const lower = word.toLowerCase();
  if (lower.length <= MIN_STEM_LENGTH) return lower;

  for (const suffix of SUFFIXES) {
    if (!lower.endsWith(suffix)) continue;
    if (suffix === 's' && /(ss|us|is)$/.test(lower)) return lower;

    const base = lower.slice(0, -suffix.length);
    if (base.length < MIN_STEM_LENGTH) continue;

    if (suffix === 'ies' || suffix === 'ied') return `${base}y`;
    return undouble(base);
  }

  return lower;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0);
}

export function stemTokens(text: string): string[] {
  return tokenize(text).map(stem);
}

/**
 * Whether needle occurs as a contiguous run inside haystack
 */
export function containsSequence(haystack: readonly string[], needle: readonly string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;

  outer: for (let start = 0; start <= haystack.length - needle.length; start++) {
    for (let offset = 0; offset < needle.length; offset++) {
      if (haystack[start + offset] !== needle[offset]) continue outer;
    }
    return true;
  }
  return false;
}
