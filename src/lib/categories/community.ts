import { StationCategory, type CategoryConfig } from "../types";
import { COMMON_SEGMENTS, TITLE_PATTERN, cell, compile } from "./patterns";

const COMMUNITY_BASE =
  "https://static.ofcom.org.uk/static/radiolicensing/html/radio-stations/community/";

export const community: CategoryConfig = {
  categoryId: StationCategory.COMMUNITY,
  listingUrl: `${COMMUNITY_BASE}community-main.htm`,
  detailBaseUrl: COMMUNITY_BASE,
  linkPrefixPattern: /^cr\d/,
  titlePattern: new RegExp(TITLE_PATTERN),
  detailPattern: compile([
    ...COMMON_SEGMENTS,
    cell("Frequency", "frequency"),
    cell("Airing from", "airingFrom"),
    cell("Airing to", "airingTo"),
    cell("Licencee", "licencee"),
    cell("Group", "group"),
  ]),
};
