export interface CategoryTaxonomy {
  topCategories: string[];
  subCategories: Record<string, string[]>;
  specificCategories: Record<string, string[]>;
}

export interface CategoryTriple {
  top: string;
  sub: string;
  specific: string;
}

export const allowedTopCategories = (taxonomy: CategoryTaxonomy): string[] => {
  const tops = new Set<string>(taxonomy.topCategories);
  for (const top of Object.keys(taxonomy.subCategories)) tops.add(top);
  for (const top of Object.keys(taxonomy.specificCategories)) tops.add(top);
  return [...tops];
};

const entriesFor = (map: Record<string, string[]>, top: string): string[] | undefined =>
  Object.hasOwn(map, top) ? map[top] : undefined;

/**
 * Closed-world check of a category triple. Returns the reasons the triple is
 * rejected; an empty list means it is allowed.
 *
 * Sub-categories and categories are only constrained for top categories that
 * list them, matching what the prompt offers the model.
 */
export function checkCategories(taxonomy: CategoryTaxonomy, triple: CategoryTriple): string[] {
  const problems: string[] = [];
  const tops = allowedTopCategories(taxonomy);

  if (tops.length > 0 && !tops.includes(triple.top)) {
    problems.push(`Top-Category "${triple.top}" is not in the taxonomy`);
    return problems;
  }

  const subs = entriesFor(taxonomy.subCategories, triple.top);
  if (subs && !subs.includes(triple.sub)) {
    problems.push(`Sub-Category "${triple.sub}" is not allowed under "${triple.top}"`);
  }

  const specifics = entriesFor(taxonomy.specificCategories, triple.top);
  if (specifics && !specifics.includes(triple.specific)) {
    problems.push(`Category "${triple.specific}" is not allowed under "${triple.top}"`);
  }

  return problems;
}
