import { describe, it, expect } from "vitest";
import { parseArgs, parseMenuChoice } from "../lib/menu";
import { StationCategory } from "../lib/types";

describe("parseMenuChoice", () => {
  it("maps menu numbers to choices", () => {
    expect(parseMenuChoice("1")).toEqual({ kind: "category", category: StationCategory.COMMUNITY });
    expect(parseMenuChoice("2")).toEqual({ kind: "category", category: StationCategory.DIGITAL });
    expect(parseMenuChoice("3")).toEqual({ kind: "category", category: StationCategory.SMALL_SCALE });
    expect(parseMenuChoice("4")).toEqual({ kind: "all" });
    expect(parseMenuChoice("5")).toEqual({ kind: "quit" });
  });

  it("accepts names, ignoring case, spaces and hyphens", () => {
    expect(parseMenuChoice(" Small-Scale ")).toEqual({
      kind: "category",
      category: StationCategory.SMALL_SCALE,
    });
    expect(parseMenuChoice("ALL")).toEqual({ kind: "all" });
    expect(parseMenuChoice("q")).toEqual({ kind: "quit" });
  });

  it("returns null for anything else", () => {
    expect(parseMenuChoice("")).toBeNull();
    expect(parseMenuChoice("6")).toBeNull();
    expect(parseMenuChoice("satellite")).toBeNull();
  });
});

describe("parseArgs", () => {
  it("collects repeated --category flags and --out", () => {
    expect(parseArgs(["--category", "Digital", "--out", "/tmp/out", "--category", "community"])).toEqual({
      categories: ["Digital", "community"],
      all: false,
      outputDir: "/tmp/out",
    });
  });

  it("recognizes --all", () => {
    expect(parseArgs(["--all"])).toEqual({ categories: [], all: true });
  });

  it("ignores a trailing flag without a value", () => {
    expect(parseArgs(["--category"])).toEqual({ categories: [], all: false });
  });
});
