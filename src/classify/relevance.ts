/**
 * Relevance Filter
 *
 * Deterministic predicate deciding whether a search hit belongs in the
 * dataset. Exclusions run first; category hints may then refine the
 * decision. Anything no rule rejects is accepted.
 *
 * @module classify/relevance
 */

/**
 * Category-specific hint. When the name contains one of `nameIncludes`,
 * the hint decides: reject if the place carries one of `rejectTypes`,
 * accept otherwise.
 */
export interface CategoryHint {
  nameIncludes: readonly string[];
  rejectTypes?: readonly string[];
}

export interface RelevanceRules {
  /** Types that exclude a place in every category */
  irrelevantTypes: readonly string[];
  /** Name fragments that exclude a place in every category */
  irrelevantNamePatterns: readonly string[];
  /** Types excluded everywhere except the listed categories */
  scopedTypes?: Readonly<Record<string, readonly string[]>>;
  /** Hints per category, first matching hint wins */
  categoryHints?: Readonly<Record<string, readonly CategoryHint[]>>;
}

/**
 * Match a fragment on word boundaries so "atm" does not hit "treatment".
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const haystack = text.toLowerCase();
  const needle = phrase.toLowerCase();
  if (needle === '') {
    return false;
  }

  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at === -1) {
      return false;
    }
    const before = at === 0 ? '' : haystack[at - 1];
    const after = haystack[at + needle.length] ?? '';
    if (!isWordChar(before) && !isWordChar(after)) {
      return true;
    }
    from = at + 1;
  }
}

function isWordChar(char: string): boolean {
  return /^[\p{L}\p{N}]$/u.test(char);
}

/**
 * Decide whether a place belongs in the dataset.
 *
 * @param name - Place name from the search response
 * @param types - Type tags from the search response
 * @param category - Query category the place was found under
 */
export function isRelevant(
  name: string,
  types: readonly string[],
  category: string,
  rules: RelevanceRules
): boolean {
  const typeSet = new Set(types.map((type) => type.toLowerCase()));

  if (rules.irrelevantTypes.some((type) => typeSet.has(type.toLowerCase()))) {
    return false;
  }

  for (const [type, allowedIn] of Object.entries(rules.scopedTypes ?? {})) {
    if (typeSet.has(type.toLowerCase()) && !allowedIn.includes(category)) {
      return false;
    }
  }

  if (rules.irrelevantNamePatterns.some((pattern) => containsPhrase(name, pattern))) {
    return false;
  }

  const hints = rules.categoryHints?.[category] ?? [];
  for (const hint of hints) {
    if (hint.nameIncludes.some((fragment) => containsPhrase(name, fragment))) {
      return !(hint.rejectTypes ?? []).some((type) => typeSet.has(type.toLowerCase()));
    }
  }

  return true;
}
