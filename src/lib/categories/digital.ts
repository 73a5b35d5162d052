import { StationCategory, type CategoryConfig } from "../types";
import { COMMON_SEGMENTS, TITLE_PATTERN, cell, compile } from "./patterns";

const DIGITAL_BASE =
  "https://static.ofcom.org.uk/static/radiolicensing/html/radio-stations/cdp/";

/** Community digital sound programme services carried on small-scale DAB */
export const digital: CategoryConfig = {
  categoryId: StationCategory.DIGITAL,
  listingUrl: `${DIGITAL_BASE}cdp-main.htm`,
  detailBaseUrl: DIGITAL_BASE,
  linkPrefixPattern: /^cdp\d/,
  titlePattern: new RegExp(TITLE_PATTERN),
  detailPattern: compile([...COMMON_SEGMENTS, cell("SSDAB multiplex", "ssdabMultiplex")]),
};
