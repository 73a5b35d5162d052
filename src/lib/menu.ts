import { StationCategory } from "./types";

export type MenuChoice =
  | { kind: "category"; category: StationCategory }
  | { kind: "all" }
  | { kind: "quit" };

export const MENU_TEXT = [
  "Which stations do you want to scrape?",
  "  1) Community",
  "  2) Digital",
  "  3) Small-Scale",
  "  4) All",
  "  5) Quit",
].join("\n");

const CHOICES: Record<string, MenuChoice> = {
  "1": { kind: "category", category: StationCategory.COMMUNITY },
  community: { kind: "category", category: StationCategory.COMMUNITY },
  "2": { kind: "category", category: StationCategory.DIGITAL },
  digital: { kind: "category", category: StationCategory.DIGITAL },
  "3": { kind: "category", category: StationCategory.SMALL_SCALE },
  smallscale: { kind: "category", category: StationCategory.SMALL_SCALE },
  "4": { kind: "all" },
  all: { kind: "all" },
  "5": { kind: "quit" },
  q: { kind: "quit" },
  quit: { kind: "quit" },
};

/** Map a line typed at the menu prompt to a choice; null when unrecognized */
export function parseMenuChoice(input: string): MenuChoice | null {
  const key = input.trim().toLowerCase().replace(/[\s-]/g, "");
  return CHOICES[key] ?? null;
}

export interface CliArgs {
  categories: string[];
  all: boolean;
  outputDir?: string;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { categories: [], all: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--category" && args[i + 1]) {
      parsed.categories.push(args[i + 1]);
      i++;
    } else if (args[i] === "--out" && args[i + 1]) {
      parsed.outputDir = args[i + 1];
      i++;
    } else if (args[i] === "--all") {
      parsed.all = true;
    }
  }

  return parsed;
}
