import type {
  CategoryConfig,
  CommonStationFields,
  ExtractionResult,
  StationRecord,
} from "./types";
import { HttpError } from "./errors";
import { applyCategoryFields, capture, joinParagraphs } from "./categories/fields";
import { fetchPage, describeError } from "./scraping/utils";

export function detailUrl(config: CategoryConfig, link: string): string {
  return `${config.detailBaseUrl}${link}`;
}

/**
 * Run a category's title and detail patterns against the raw text of a detail
 * page. Returns null when the title is missing, which means no station.
 */
export function parseStationPage(
  config: CategoryConfig,
  html: string
): StationRecord | null {
  const title = html.match(config.titlePattern);
  const name = title?.groups?.name;
  if (!title || name === undefined || title[0] === "") return null;

  const groups = html.match(config.detailPattern)?.groups;
  const common: CommonStationFields = {
    name,
    licenceNumber: capture(groups, "licenceNumber"),
    contactDetails: joinParagraphs(capture(groups, "contactDetails"), " "),
    telephone: capture(groups, "telephone"),
    website: capture(groups, "website"),
    email: capture(groups, "email"),
  };

  return applyCategoryFields(config.categoryId, common, groups);
}

/**
 * Fetch one station's detail page and extract its record.
 * Fetch failures and missing titles come back as distinct error notes.
 */
export async function extractStation(
  config: CategoryConfig,
  link: string
): Promise<ExtractionResult> {
  const url = detailUrl(config, link);

  let html: string;
  try {
    html = await fetchPage(url);
  } catch (err) {
    const reason = err instanceof HttpError ? `HTTP ${err.status}` : describeError(err);
    console.warn(`[extract] Failed to fetch ${url}:`, describeError(err));
    return { ok: false, note: `Fetch failed at ${url}: ${reason}` };
  }

  const record = parseStationPage(config, html);
  if (!record) {
    console.warn(`[extract] No station title at ${url}`);
    return { ok: false, note: `No URL at ${url}` };
  }
  return { ok: true, record };
}
