/**
 * Sub-category Classifier
 *
 * One rule table, keyed by (category, sub_category), splits a coarse
 * sub-category into a specific one. First matching rule wins; no match
 * keeps the input.
 *
 * @module classify/classifier
 */

export interface ClassificationRule {
  category: string;
  /** Omit to match every sub-category of the category */
  subCategory?: string;
  /** Name must contain one of these (case-insensitive substring) */
  nameIncludes?: readonly string[];
  /** Name must contain none of these */
  nameExcludes?: readonly string[];
  /** Place must carry one of these types */
  typesInclude?: readonly string[];
  /** Refined sub-category; omit to keep the input and stop matching */
  result?: string;
}

function matches(
  rule: ClassificationRule,
  name: string,
  types: ReadonlySet<string>,
  category: string,
  subCategory: string
): boolean {
  if (rule.category !== category) return false;
  if (rule.subCategory !== undefined && rule.subCategory !== subCategory) return false;
  if (rule.nameIncludes && !rule.nameIncludes.some((f) => name.includes(f.toLowerCase()))) {
    return false;
  }
  if (rule.nameExcludes?.some((f) => name.includes(f.toLowerCase()))) return false;
  if (rule.typesInclude && !rule.typesInclude.some((t) => types.has(t.toLowerCase()))) {
    return false;
  }
  return true;
}

/**
 * Refine a sub-category from name and type heuristics.
 *
 * @example
 * refine('Happy Paws Grooming & Vet', ['veterinary_care'], 'Competitor', 'Clinic_General', rules);
 * // 'Clinic+Grooming'
 */
export function refine(
  name: string,
  types: readonly string[],
  category: string,
  subCategory: string,
  rules: readonly ClassificationRule[]
): string {
  const lowerName = name.toLowerCase();
  const typeSet = new Set(types.map((type) => type.toLowerCase()));

  const rule = rules.find((candidate) =>
    matches(candidate, lowerName, typeSet, category, subCategory)
  );
  return rule?.result ?? subCategory;
}
