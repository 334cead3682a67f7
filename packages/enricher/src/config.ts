// packages/enricher/src/config.ts
import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors";
dotenv.config();

const bool = (v: string | undefined, def = false) =>
  v == null ? def : ["1", "true", "on", "yes"].includes(v.toLowerCase());

const num = (v: string | undefined, def: number) => {
  const n = parseInt(v || "", 10);
  return Number.isFinite(n) ? n : def;
};

export const CFG = {
  // WhatCMS
  WHATCMS_API_KEY: (process.env.WHATCMS_API_KEY || "").trim(),
  WHATCMS_BASE_URL: process.env.WHATCMS_BASE_URL || "https://whatcms.org/API/Tech",

  // Plan gratuito: 1 petición cada 10 s
  WHATCMS_DELAY_MS: num(process.env.WHATCMS_DELAY_MS, 10_000),
  WHATCMS_TIMEOUT_MS: num(process.env.WHATCMS_TIMEOUT_MS, 30_000),

  // Ficheros
  ENRICH_INPUT_FILE: (process.env.ENRICH_INPUT_FILE || "").trim(),
  ENRICH_OUTPUT_FILE: (process.env.ENRICH_OUTPUT_FILE || "").trim(),
  ENRICH_SHEET_NAME: process.env.ENRICH_SHEET_NAME || "WHATCMS INPUT",
  ENRICH_URL_COLUMN: process.env.ENRICH_URL_COLUMN || "url",

  // Verbose
  VERBOSE: bool(process.env.ENRICH_VERBOSE, false),
};

/** `--delay` en segundos -> ms. */
export function delayFromSeconds(raw: string): number {
  const s = raw.trim() === "" ? NaN : Number(raw);
  if (!Number.isFinite(s) || s < 0) throw new ConfigurationError(`Invalid --delay: ${raw}`);
  return Math.round(s * 1000);
}
