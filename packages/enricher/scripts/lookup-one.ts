#!/usr/bin/env tsx
import { parseArgs } from "node:util";
import { CFG, ConfigurationError, WhatCmsClient, delayFromSeconds, describeRecord } from "../src";

const USAGE = "Uso: npm run lookup -- --url=<URL> [--delay=<segundos>] [--verbose]";

async function main() {
  const { values } = parseArgs({
    options: {
      url: { type: "string" },
      delay: { type: "string" }, // segundos
      verbose: { type: "boolean", default: false },
    },
  });
  if (!values.url) throw new ConfigurationError(USAGE);
  if (!CFG.WHATCMS_API_KEY) throw new ConfigurationError("Falta WHATCMS_API_KEY en .env");

  // una sola petición: el delay sólo cuenta si el cliente se reutiliza
  const client = new WhatCmsClient({
    apiKey: CFG.WHATCMS_API_KEY,
    delayMs: values.delay != null ? delayFromSeconds(values.delay) : undefined,
    verbose: values.verbose || CFG.VERBOSE,
  });
  console.log(`[lookup] url: ${values.url} · delay ${client.delayMs}ms`);
  const record = await client.fetch(values.url);
  console.log(describeRecord(record));
}

main().catch((e) => {
  console.error("[lookup] error:", e instanceof Error ? `${e.name}: ${e.message}` : e);
  process.exit(1);
});
