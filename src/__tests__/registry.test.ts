import { describe, it, expect } from "vitest";
import { getCategories, getAllCategoryNames } from "../lib/categories/registry";
import { UnknownCategoryError } from "../lib/errors";
import { StationCategory } from "../lib/types";

describe("category registry", () => {
  it("lists every category in order", () => {
    expect(getAllCategoryNames()).toEqual(["Community", "Digital", "SmallScale"]);
  });

  it("returns all categories when no names are given", () => {
    expect(getCategories().map((c) => c.categoryId)).toEqual([
      StationCategory.COMMUNITY,
      StationCategory.DIGITAL,
      StationCategory.SMALL_SCALE,
    ]);
  });

  it("matches names ignoring case and punctuation", () => {
    expect(getCategories(["small-scale", "COMMUNITY"]).map((c) => c.categoryId)).toEqual([
      StationCategory.COMMUNITY,
      StationCategory.SMALL_SCALE,
    ]);
  });

  it("throws for an unknown category name", () => {
    expect(() => getCategories(["Digital", "Satellite"])).toThrow(UnknownCategoryError);
  });

  it("builds detail URLs from base + link", () => {
    for (const config of getCategories()) {
      expect(config.listingUrl.startsWith(config.detailBaseUrl)).toBe(true);
      expect(config.detailBaseUrl.endsWith("/")).toBe(true);
    }
  });

  it("link patterns only accept their own category's station pages", () => {
    const [community, digital, smallScale] = getCategories();
    expect(community.linkPrefixPattern.test("cr000101.htm")).toBe(true);
    expect(community.linkPrefixPattern.test("cdp123")).toBe(false);
    expect(digital.linkPrefixPattern.test("cdp123")).toBe(true);
    expect(digital.linkPrefixPattern.test("cdp-main.htm")).toBe(false);
    expect(smallScale.linkPrefixPattern.test("ssdab4")).toBe(true);
    expect(smallScale.linkPrefixPattern.test("ssdab-main.htm")).toBe(false);
  });
});
