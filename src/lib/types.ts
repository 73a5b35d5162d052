// ===== Enums =====

export enum StationCategory {
  COMMUNITY = "Community",
  DIGITAL = "Digital",
  SMALL_SCALE = "SmallScale",
}

// ===== Category configuration =====

export interface CategoryConfig {
  readonly categoryId: StationCategory;
  /** Listing page enumerating every station of the category */
  readonly listingUrl: string;
  /** Prefix that station links are appended to, verbatim */
  readonly detailBaseUrl: string;
  readonly linkPrefixPattern: RegExp;
  /** Must capture the named group `name` */
  readonly titlePattern: RegExp;
  readonly detailPattern: RegExp;
}

// ===== Station records =====

/** Named captures of a detail pattern; groups that did not participate are undefined */
export type MatchGroups = Record<string, string | undefined>;

export type CommonStationFields = {
  name: string;
  licenceNumber: string;
  contactDetails: string;
  telephone: string;
  website: string;
  email: string;
};

export type CommunityStationRecord = CommonStationFields & {
  category: StationCategory.COMMUNITY;
  frequency: string;
  airingFrom: string;
  airingTo: string;
  licencee: string;
  group: string;
};

export type DigitalStationRecord = CommonStationFields & {
  category: StationCategory.DIGITAL;
  ssdabMultiplex: string;
};

export type SmallScaleStationRecord = CommonStationFields & {
  category: StationCategory.SMALL_SCALE;
  frequency: string;
  licensee: string;
};

export type StationRecord =
  | CommunityStationRecord
  | DigitalStationRecord
  | SmallScaleStationRecord;

/** One line of the error output file */
export type ErrorNote = string;

export type ExtractionResult =
  | { ok: true; record: StationRecord }
  | { ok: false; note: ErrorNote };

// ===== Runs =====

export interface RunResult {
  category: StationCategory;
  records: StationRecord[];
  errors: ErrorNote[];
}

export interface OutputPaths {
  csvPath: string;
  errorPath: string;
}

export interface RunSummary {
  category: StationCategory;
  linkCount: number;
  recordCount: number;
  errorCount: number;
  durationMs: number;
  /** Absent when the output files could not be written */
  output?: OutputPaths;
}
