// packages/enricher/src/record.ts
import { CATEGORY_COLUMNS } from "./categories";
import { TECH_FIELDS, type TechCategories, type TechField, type TechRecord } from "./types";

export type TechRecordInit = Partial<{
  detailLink: string;
  responseStatus: string;
  categories: Partial<Record<TechField, readonly string[]>>;
}>;

export const LIST_SEPARATOR = ", ";

function freezeCategories(init: Partial<Record<TechField, readonly string[]>> = {}): TechCategories {
  const list = (field: TechField) => Object.freeze([...(init[field] ?? [])]);
  return {
    blogCms: list("blogCms"),
    ecommerceCms: list("ecommerceCms"),
    programmingLanguage: list("programmingLanguage"),
    database: list("database"),
    cdn: list("cdn"),
    webServer: list("webServer"),
    landingPageBuilderCms: list("landingPageBuilderCms"),
    operatingSystem: list("operatingSystem"),
    webFramework: list("webFramework"),
    other: list("other"),
  };
}

export function createTechRecord(sourceUrl: string, init: TechRecordInit = {}): TechRecord {
  return Object.freeze({
    sourceUrl,
    detailLink: init.detailLink ?? "",
    responseStatus: init.responseStatus ?? "",
    ...freezeCategories(init.categories),
  });
}

export function joinList(list: readonly string[]): string {
  return list.join(LIST_SEPARATOR);
}

export function describeRecord(r: TechRecord): string {
  const lines = [`TechRecord(${r.sourceUrl})`, `  status: ${r.responseStatus}`];
  if (r.detailLink) lines.push(`  link: ${r.detailLink}`);
  for (const field of TECH_FIELDS) {
    if (r[field].length) lines.push(`  ${CATEGORY_COLUMNS[field]}: ${joinList(r[field])}`);
  }
  return lines.join("\n");
}
