// packages/enricher/src/types.ts
export const TECH_FIELDS = [
  "blogCms",
  "ecommerceCms",
  "programmingLanguage",
  "database",
  "cdn",
  "webServer",
  "landingPageBuilderCms",
  "operatingSystem",
  "webFramework",
  "other",
] as const;

export type TechField = (typeof TECH_FIELDS)[number];

export type TechCategories = { readonly [K in TechField]: readonly string[] };

export type TechRecord = TechCategories & {
  readonly sourceUrl: string;
  readonly detailLink: string;
  readonly responseStatus: string;
};

/** Anything that turns a URL into a record; the orchestrator only needs this. */
export interface TechLookup {
  fetch(url: string): Promise<TechRecord>;
}

export type Row = Record<string, string>;

export interface Table {
  /** Row keys, unique. */
  columns: string[];
  /** Header text as written; defaults to `columns`. */
  headers?: string[];
  rows: Row[];
}

export type LogLevel = "info" | "error";

export interface RunSummary {
  rows: number;
  ok: number;
  failed: number;
  outputPath: string;
}
