/**
 * Pattern sources for the station detail pages.
 *
 * Detail pages lay fields out as `<th>Label</th><td>value</td>` rows. Each
 * field is an optional segment, so a missing row leaves its group undefined
 * instead of failing the whole match. Segments must be listed in page order:
 * each one starts scanning where the previous capture ended.
 */

export const TITLE_PATTERN = String.raw`<h1[^>]*>(?<name>[\s\S]*?)</h1>`;

/** Row whose cell may hold `<p>` paragraphs; the leading `<p>` is not captured */
export function cell(label: string, group: string): string {
  return String.raw`(?:[\s\S]*?<th>${label}:?</th>\s*<td>(?:<p>)?(?<${group}>[\s\S]*?)</td>)?`;
}

/** Row whose value may be wrapped in a single anchor */
function linkCell(label: string, group: string): string {
  return String.raw`(?:[\s\S]*?<th>${label}:?</th>\s*<td>(?:<a [^>]*>)?(?<${group}>[^<]*))?`;
}

export const COMMON_SEGMENTS = [
  cell("Licence number", "licenceNumber"),
  cell("Contact details", "contactDetails"),
  cell("Telephone", "telephone"),
  linkCell("Website", "website"),
  linkCell("Email", "email"),
];

export function compile(segments: string[]): RegExp {
  return new RegExp(segments.join(""));
}
