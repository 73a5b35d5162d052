import type { CategoryConfig, RunResult, RunSummary } from "./types";
import { ListingFetchError, OutputWriteError } from "./errors";
import { fetchLinks, filterLinks } from "./scraping/links";
import { extractStation } from "./extract";
import { assertKnownCategory } from "./categories/fields";
import { writeOutputs } from "./output";

/**
 * Fetch, filter and extract every station of one category, one page at a time.
 */
export async function scrapeCategory(config: CategoryConfig): Promise<RunResult> {
  assertKnownCategory(config.categoryId);
  const tag = `[${config.categoryId}]`;
  const rawLinks = await fetchLinks(config.listingUrl);
  const links = filterLinks(rawLinks, config.linkPrefixPattern);
  console.log(`${tag} ${links.length} station links`);

  const result: RunResult = { category: config.categoryId, records: [], errors: [] };

  for (let i = 0; i < links.length; i++) {
    const extracted = await extractStation(config, links[i]);
    if (extracted.ok) {
      result.records.push(extracted.record);
    } else {
      result.errors.push(extracted.note);
    }
    const pct = Math.round(((i + 1) / links.length) * 100);
    console.log(`${tag} ${i + 1}/${links.length} (${pct}%)`);
  }

  return result;
}

/**
 * Scrape one category and write its output files.
 * Returns null when the listing page could not be fetched; nothing is written then.
 */
export async function runCategory(
  config: CategoryConfig,
  outputDir: string
): Promise<RunSummary | null> {
  const tag = `[${config.categoryId}]`;
  const startTime = Date.now();
  console.log(`\n=== ${config.categoryId} ===`);

  let result: RunResult;
  try {
    result = await scrapeCategory(config);
  } catch (err) {
    if (err instanceof ListingFetchError) {
      console.error(`${tag} Skipped: ${err.message}`);
      return null;
    }
    throw err;
  }

  const summary: RunSummary = {
    category: result.category,
    linkCount: result.records.length + result.errors.length,
    recordCount: result.records.length,
    errorCount: result.errors.length,
    durationMs: 0,
  };

  try {
    summary.output = await writeOutputs(result.category, result.records, result.errors, outputDir);
  } catch (err) {
    if (!(err instanceof OutputWriteError)) throw err;
    const cause = err.cause instanceof Error ? err.cause.message : "";
    console.error(`${tag} ${err.message}${cause ? `: ${cause}` : ""}`);
  }

  summary.durationMs = Date.now() - startTime;
  console.log(
    `${tag} ${summary.recordCount} stations, ${summary.errorCount} errors in ${summary.durationMs}ms`
  );
  return summary;
}

/** Run categories strictly in sequence */
export async function runCategories(
  configs: CategoryConfig[],
  outputDir: string
): Promise<RunSummary[]> {
  const summaries: RunSummary[] = [];
  for (const config of configs) {
    const summary = await runCategory(config, outputDir);
    if (summary) summaries.push(summary);
  }
  return summaries;
}
