/**
 * Naming helpers shared by the annotator and the candidate generators
 */

const regexCache = new Map<string, RegExp>();

/**
 * Convert a `*` wildcard pattern to an anchored, case-insensitive RegExp
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const cached = regexCache.get(pattern);
  if (cached) return cached;

  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  const regex = new RegExp(`^${source}$`, 'i');
  regexCache.set(pattern, regex);
  return regex;
}

export function matchesAnyPattern(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => wildcardToRegExp(pattern).test(name));
}

/**
 * Strip the first matching key suffix (case-insensitive).
 * Returns undefined when the name carries none or nothing would remain.
 */
export function stripKeySuffix(name: string, suffixes: readonly string[]): string | undefined {
  const lower = name.toLowerCase();
  for (const suffix of suffixes) {
    if (lower.endsWith(suffix.toLowerCase()) && lower.length > suffix.length) {
      return name.slice(0, -suffix.length);
    }
  }
  return undefined;
}

/**
 * Pluralize a word using basic English rules
 */
export function pluralize(word: string): string {
  const lower = word.toLowerCase();

  // Ends with consonant + y → ies
  if (lower.endsWith('y') && lower.length > 1) {
    const beforeY = lower.charAt(lower.length - 2);
    if (!/[aeiou]/.test(beforeY)) {
      return word.slice(0, -1) + 'ies';
    }
  }

  if (
    lower.endsWith('s') ||
    lower.endsWith('x') ||
    lower.endsWith('z') ||
    lower.endsWith('sh') ||
    lower.endsWith('ch')
  ) {
    return word + 'es';
  }

  return word + 's';
}

export function singularize(word: string): string {
  const lower = word.toLowerCase();

  if (lower.endsWith('ies') && lower.length > 3) {
    return word.slice(0, -3) + 'y';
  }

  if (lower.endsWith('s') && lower.length > 1) {
    return word.slice(0, -1);
  }

  return word;
}
