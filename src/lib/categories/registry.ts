import type { CategoryConfig } from "../types";
import { UnknownCategoryError } from "../errors";
import { community } from "./community";
import { digital } from "./digital";
import { smallScale } from "./small-scale";

const ALL_CATEGORIES: readonly CategoryConfig[] = [community, digital, smallScale];

// "Small-Scale", "small scale" and "SmallScale" all resolve to the same category
function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Resolve category names to their configs, in registry order.
 * No names means every category; an unrecognized name throws.
 */
export function getCategories(names?: string[]): CategoryConfig[] {
  if (!names || names.length === 0) return [...ALL_CATEGORIES];

  const wanted = new Set<string>();
  for (const name of names) {
    const key = normalizeName(name);
    if (!ALL_CATEGORIES.some((c) => normalizeName(c.categoryId) === key)) {
      throw new UnknownCategoryError(name);
    }
    wanted.add(key);
  }
  return ALL_CATEGORIES.filter((c) => wanted.has(normalizeName(c.categoryId)));
}

export function getAllCategoryNames(): string[] {
  return ALL_CATEGORIES.map((c) => c.categoryId);
}
