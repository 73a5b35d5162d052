import { StationCategory, type CategoryConfig } from "../types";
import { COMMON_SEGMENTS, TITLE_PATTERN, cell, compile } from "./patterns";

const SMALL_SCALE_BASE =
  "https://static.ofcom.org.uk/static/radiolicensing/html/radio-stations/ssdab/";

/** Small-scale DAB multiplex licences */
export const smallScale: CategoryConfig = {
  categoryId: StationCategory.SMALL_SCALE,
  listingUrl: `${SMALL_SCALE_BASE}ssdab-main.htm`,
  detailBaseUrl: SMALL_SCALE_BASE,
  linkPrefixPattern: /^ssdab\d/,
  titlePattern: new RegExp(TITLE_PATTERN),
  detailPattern: compile([
    ...COMMON_SEGMENTS,
    cell("Frequency", "frequency"),
    cell("Licensee", "licensee"),
  ]),
};
