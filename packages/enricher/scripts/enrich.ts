#!/usr/bin/env tsx
import fs from "node:fs";
import { parseArgs } from "node:util";
import { DEFAULT_CONFIG_PATH, loadConfig, type EnrichConfig } from "@techscan/utils/config";
import { CFG, ConfigurationError, DataEnricher, WhatCmsClient, delayFromSeconds, isSpreadsheet } from "../src";

// === flags CLI ===
const cli = () =>
  parseArgs({
    options: {
      config: { type: "string" },
      input: { type: "string" },
      output: { type: "string" },
      sheet: { type: "string" },
      delay: { type: "string" }, // segundos
      verbose: { type: "boolean", default: false },
    },
  }).values;

type Flags = ReturnType<typeof cli>;

function readConfig(values: Flags): EnrichConfig {
  // --config explícito debe existir; el de por defecto es opcional
  if (values.config) return loadConfig(values.config);
  return fs.existsSync(DEFAULT_CONFIG_PATH) ? loadConfig(DEFAULT_CONFIG_PATH) : {};
}

function delayMs(values: Flags, cfg: EnrichConfig): number {
  if (values.delay != null) return delayFromSeconds(values.delay);
  return cfg.rate_limit_delay != null ? Math.round(cfg.rate_limit_delay * 1000) : CFG.WHATCMS_DELAY_MS;
}

async function main() {
  const values = cli();
  const cfg = readConfig(values);

  const apiKey = cfg.api_key || CFG.WHATCMS_API_KEY;
  if (!apiKey) throw new ConfigurationError("API key not found (api_key in config or WHATCMS_API_KEY)");

  const input = values.input ?? cfg.input_file ?? CFG.ENRICH_INPUT_FILE;
  const output = values.output ?? cfg.output_file ?? CFG.ENRICH_OUTPUT_FILE;
  if (!input) throw new ConfigurationError("No input file (--input, input_file or ENRICH_INPUT_FILE)");
  if (!output) throw new ConfigurationError("No output file (--output, output_file or ENRICH_OUTPUT_FILE)");

  const sheet = values.sheet ?? cfg.sheet_name ?? CFG.ENRICH_SHEET_NAME;

  const client = new WhatCmsClient({
    apiKey,
    delayMs: delayMs(values, cfg),
    verbose: values.verbose || CFG.VERBOSE,
  });
  console.log(
    `[enrich] ${input} -> ${output}` +
      (isSpreadsheet(input) ? ` (sheet "${sheet}")` : "") +
      ` · delay ${client.delayMs}ms`
  );

  const enricher = new DataEnricher(client, { urlColumn: cfg.url_column ?? CFG.ENRICH_URL_COLUMN });
  const summary = await enricher.run(input, output, sheet);
  console.log(`[enrich] ✅ ${summary.rows} rows → ${summary.outputPath}`);
}

main().catch((e) => {
  console.error("[enrich] fatal:", e instanceof Error ? `${e.name}: ${e.message}` : e);
  process.exit(1);
});
