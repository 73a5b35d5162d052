import {
  StationCategory,
  type CommonStationFields,
  type MatchGroups,
  type StationRecord,
} from "../types";
import { UnknownCategoryError } from "../errors";

const PARAGRAPH_BREAK = "</p><p>";

/**
 * Flatten a multi-paragraph cell: every `</p><p>` becomes the delimiter and
 * one trailing `</p>` is dropped.
 */
export function joinParagraphs(value: string, delimiter: string): string {
  const joined = value.split(PARAGRAPH_BREAK).join(delimiter);
  return joined.endsWith("</p>") ? joined.slice(0, -"</p>".length) : joined;
}

const KNOWN_CATEGORIES = new Set<string>(Object.values(StationCategory));

/** Guard run before any fetching: an id outside StationCategory ends the run */
export function assertKnownCategory(categoryId: string): void {
  if (!KNOWN_CATEGORIES.has(categoryId)) throw new UnknownCategoryError(categoryId);
}

export function capture(groups: MatchGroups | undefined, key: string): string {
  return groups?.[key] ?? "";
}

/**
 * Append the category-specific fields to a common record.
 * An id outside StationCategory is a programming error and throws.
 */
export function applyCategoryFields(
  categoryId: string,
  common: CommonStationFields,
  groups: MatchGroups | undefined
): StationRecord {
  switch (categoryId) {
    case StationCategory.COMMUNITY:
      return {
        category: StationCategory.COMMUNITY,
        ...common,
        frequency: joinParagraphs(capture(groups, "frequency"), " "),
        airingFrom: capture(groups, "airingFrom"),
        airingTo: capture(groups, "airingTo"),
        licencee: capture(groups, "licencee"),
        group: capture(groups, "group"),
      };
    case StationCategory.DIGITAL:
      return {
        category: StationCategory.DIGITAL,
        ...common,
        ssdabMultiplex: capture(groups, "ssdabMultiplex"),
      };
    case StationCategory.SMALL_SCALE:
      return {
        category: StationCategory.SMALL_SCALE,
        ...common,
        frequency: joinParagraphs(capture(groups, "frequency"), ", "),
        licensee: capture(groups, "licensee"),
      };
    default:
      throw new UnknownCategoryError(categoryId);
  }
}
