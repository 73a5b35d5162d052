import { createInterface } from "readline/promises";
import { stdin as input, stdout as output } from "process";
import type { CategoryConfig } from "../lib/types";
import { config } from "../lib/config";
import { UnknownCategoryError } from "../lib/errors";
import { getCategories, getAllCategoryNames } from "../lib/categories/registry";
import { MENU_TEXT, parseArgs, parseMenuChoice } from "../lib/menu";
import { resolveOutputDir } from "../lib/output";
import { runCategories } from "../lib/pipeline";

async function run(configs: CategoryConfig[], outputDir: string): Promise<void> {
  const summaries = await runCategories(configs, outputDir);

  console.log(`\n=== Summary ===`);
  for (const s of summaries) {
    console.log(`${s.category}: ${s.recordCount} stations, ${s.errorCount} errors`);
  }
}

async function interactive(requestedDir: string | undefined): Promise<void> {
  const rl = createInterface({ input, output });
  try {
    const dir = requestedDir ?? (await rl.question("Output directory (blank for current): "));
    const outputDir = resolveOutputDir(dir);
    console.log(`Writing output to ${outputDir}`);

    for (;;) {
      const choice = parseMenuChoice(await rl.question(`\n${MENU_TEXT}\n> `));
      if (!choice) {
        console.log("Please pick one of the listed options.");
        continue;
      }
      if (choice.kind === "quit") break;

      const names = choice.kind === "all" ? undefined : [choice.category];
      await run(getCategories(names), outputDir);
    }
  } finally {
    rl.close();
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const requestedDir = args.outputDir ?? (config.outputDir || undefined);

  if (args.all || args.categories.length > 0) {
    const configs = getCategories(args.all ? undefined : args.categories);
    console.log(`Scraping categories: ${configs.map((c) => c.categoryId).join(", ")}`);
    await run(configs, resolveOutputDir(requestedDir));
  } else {
    await interactive(requestedDir);
  }
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    if (err instanceof UnknownCategoryError) {
      console.error(`${err.message}. Available: ${getAllCategoryNames().join(", ")}`);
    } else {
      console.error("Fatal error:", err);
    }
    process.exit(1);
  });
