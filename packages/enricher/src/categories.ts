// packages/enricher/src/categories.ts
import type { TechField } from "./types";

/** Provider category label -> record field. Exact, case-sensitive match. */
export const CATEGORY_LABELS: Readonly<Record<string, TechField>> = {
  cms: "blogCms",
  blog: "blogCms",
  blog_cms: "blogCms",
  ecommerce: "ecommerceCms",
  ecommerce_cms: "ecommerceCms",
  programming_language: "programmingLanguage",
  language: "programmingLanguage",
  database: "database",
  cdn: "cdn",
  web_server: "webServer",
  landing_page_builder: "landingPageBuilderCms",
  landing_page_builder_cms: "landingPageBuilderCms",
  operating_system: "operatingSystem",
  web_framework: "webFramework",
  framework: "webFramework",
};

/** Output column per field, in export order. */
export const CATEGORY_COLUMNS: Readonly<Record<TechField, string>> = {
  blogCms: "Blog_CMS",
  ecommerceCms: "E-commerce_CMS",
  programmingLanguage: "Programming_Language",
  database: "Database",
  cdn: "CDN",
  webServer: "Web_Server",
  landingPageBuilderCms: "Landing_Page_Builder_CMS",
  operatingSystem: "Operating_System",
  webFramework: "Web_Framework",
  other: "Other",
};

// ["E-commerce", "CMS"] -> "ecommerce_cms"
export function labelFromCategories(categories: readonly string[]): string {
  return categories.join("_").toLowerCase().replace(/-/g, "").replace(/ /g, "_");
}

export function classify(label: string | null | undefined): TechField {
  if (!label) return "other";
  return Object.hasOwn(CATEGORY_LABELS, label) ? CATEGORY_LABELS[label] : "other";
}
