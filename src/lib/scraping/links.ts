import * as cheerio from "cheerio";
import { fetchPage, describeError } from "./utils";
import { HttpError, ListingFetchError } from "../errors";

/**
 * Fetch a listing page and collect the distinct href values of its anchors,
 * in document order.
 */
export async function fetchLinks(url: string): Promise<Set<string>> {
  let html: string;
  try {
    html = await fetchPage(url);
  } catch (err) {
    if (err instanceof HttpError && err.status === 404) {
      console.error(`[links] Page not found: ${url}`);
    } else if (err instanceof HttpError) {
      console.error(`[links] Listing returned status ${err.status}: ${url}`);
    } else {
      console.error(`[links] Failed to fetch ${url}:`, describeError(err));
    }
    throw new ListingFetchError(url, { cause: err });
  }

  const $ = cheerio.load(html);
  const links = new Set<string>();
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (href) links.add(href);
  });

  console.log(`[links] Found ${links.size} distinct links on ${url}`);
  return links;
}

/** Keep the links the prefix pattern matches, preserving iteration order */
export function filterLinks(rawLinks: Iterable<string>, prefixPattern: RegExp): string[] {
  const result: string[] = [];
  for (const link of rawLinks) {
    // Patterns are compiled without g/y, so test() carries no lastIndex state
    if (prefixPattern.test(link)) result.push(link);
  }
  return result;
}
