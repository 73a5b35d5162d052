import { existsSync, statSync } from "fs";
import { writeFile } from "fs/promises";
import { join } from "path";
import { createObjectCsvStringifier } from "csv-writer";
import {
  StationCategory,
  type ErrorNote,
  type OutputPaths,
  type StationRecord,
} from "./types";
import { OutputWriteError, UnknownCategoryError } from "./errors";

interface CsvColumn {
  id: string;
  title: string;
}

const COMMON_COLUMNS: CsvColumn[] = [
  { id: "name", title: "Name" },
  { id: "licenceNumber", title: "Licence Number" },
  { id: "contactDetails", title: "Contact Details" },
  { id: "telephone", title: "Telephone" },
  { id: "website", title: "Website" },
  { id: "email", title: "Email" },
];

const CATEGORY_COLUMNS: Record<StationCategory, CsvColumn[]> = {
  [StationCategory.COMMUNITY]: [
    { id: "frequency", title: "Frequency" },
    { id: "airingFrom", title: "Airing From" },
    { id: "airingTo", title: "Airing To" },
    { id: "licencee", title: "Licencee" },
    { id: "group", title: "Group" },
  ],
  [StationCategory.DIGITAL]: [{ id: "ssdabMultiplex", title: "SSDAB multiplex" }],
  [StationCategory.SMALL_SCALE]: [
    { id: "frequency", title: "Frequency" },
    { id: "licensee", title: "Licensee" },
  ],
};

/** CSV columns for a category: the common set, then the category's own */
export function csvColumns(category: StationCategory): CsvColumn[] {
  const own: CsvColumn[] | undefined = CATEGORY_COLUMNS[category];
  if (!own) throw new UnknownCategoryError(category);
  return [...COMMON_COLUMNS, ...own];
}

/** Header line plus one line per record; no blank line when there are no records */
export function toCsv(category: StationCategory, records: StationRecord[]): string {
  const stringifier = createObjectCsvStringifier({ header: csvColumns(category) });
  const header = stringifier.getHeaderString() ?? "";
  return records.length > 0 ? header + stringifier.stringifyRecords(records) : header;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** yyMMdd-HHmm in local time */
export function formatTimestamp(date: Date = new Date()): string {
  const yy = pad(date.getFullYear() % 100);
  return `${yy}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}`;
}

/**
 * Use the requested directory when it exists, otherwise the working directory.
 */
export function resolveOutputDir(requested?: string): string {
  const dir = requested?.trim();
  if (!dir) return process.cwd();
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    console.warn(`[output] ${dir} does not exist, writing to ${process.cwd()}`);
    return process.cwd();
  }
  return dir;
}

/**
 * Write `<category>-<timestamp>.csv` and `Error-<category>-<timestamp>.txt`.
 * The timestamp is taken fresh on every call. Both files are written even
 * when empty.
 */
export async function writeOutputs(
  category: StationCategory,
  records: StationRecord[],
  errors: ErrorNote[],
  outputDir: string
): Promise<OutputPaths> {
  const timestamp = formatTimestamp();
  const csvPath = join(outputDir, `${category}-${timestamp}.csv`);
  const errorPath = join(outputDir, `Error-${category}-${timestamp}.txt`);

  const csv = toCsv(category, records);
  try {
    await writeFile(csvPath, csv, "utf-8");
  } catch (err) {
    throw new OutputWriteError(csvPath, { cause: err });
  }
  console.log(`[output] Wrote ${records.length} records to ${csvPath}`);

  const body = errors.map((note) => `${note}\n`).join("");
  try {
    await writeFile(errorPath, body, "utf-8");
  } catch (err) {
    throw new OutputWriteError(errorPath, { cause: err });
  }
  console.log(`[output] Wrote ${errors.length} error notes to ${errorPath}`);

  return { csvPath, errorPath };
}
