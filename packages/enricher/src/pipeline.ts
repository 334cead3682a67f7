// packages/enricher/src/pipeline.ts
import { CFG } from "./config";
import { CATEGORY_COLUMNS } from "./categories";
import { ConfigurationError, errorMessage } from "./errors";
import { createTechRecord, joinList } from "./record";
import { statusError } from "./client";
import { isWritableFormat, readTable, writeTable } from "./utils/table";
import { TECH_FIELDS, type LogLevel, type Row, type RunSummary, type TechLookup, type TechRecord } from "./types";

/**
 * Orquestador:
 * 1) Lee la tabla de entrada (CSV u hoja de cálculo) y comprueba la columna url
 * 2) Consulta WhatCMS fila a fila, en orden (el cliente aplica el rate limit)
 * 3) Añade las columnas de enriquecimiento a cada fila
 * 4) Escribe la tabla completa una sola vez al final
 */

export const LINK_COLUMN = "whatcms_link";
export const STATUS_COLUMN = "whatcms_response";

export const ENRICHMENT_COLUMNS: readonly string[] = [
  LINK_COLUMN,
  ...TECH_FIELDS.map((f) => CATEGORY_COLUMNS[f]),
  STATUS_COLUMN,
];

export type EnricherOpts = {
  urlColumn?: string;
  onLog?: (line: string, level?: LogLevel) => void;
};

export function recordToColumns(r: TechRecord): Row {
  const out: Row = { [LINK_COLUMN]: r.detailLink };
  for (const f of TECH_FIELDS) out[CATEGORY_COLUMNS[f]] = joinList(r[f]);
  out[STATUS_COLUMN] = r.responseStatus;
  return out;
}

export const isSuccess = (status: string) => /^200\b/.test(status);

export class DataEnricher {
  private readonly urlColumn: string;

  constructor(
    private readonly client: TechLookup,
    private readonly opts: EnricherOpts = {}
  ) {
    this.urlColumn = opts.urlColumn ?? CFG.ENRICH_URL_COLUMN;
  }

  private log(s: string, l: LogLevel = "info") {
    (l === "error" ? console.error : console.log)(`[pipeline] ${s}`);
    this.opts.onLog?.(`[pipeline] ${s}`, l);
  }

  async run(inputPath: string, outputPath: string, sheetName?: string): Promise<RunSummary> {
    // antes de gastar llamadas a la API
    if (!isWritableFormat(outputPath)) {
      throw new ConfigurationError(`Unsupported output format: ${outputPath}`);
    }
    const input = readTable(inputPath, sheetName);
    if (!input.columns.includes(this.urlColumn)) {
      throw new ConfigurationError(`Column '${this.urlColumn}' not found in ${inputPath}`);
    }
    this.log(`loaded ${input.rows.length} rows from ${inputPath}`);

    const total = input.rows.length;
    const rows: Row[] = [];
    let ok = 0;

    for (const [i, row] of input.rows.entries()) {
      const url = row[this.urlColumn] ?? "";
      const record = await this.lookup(url);
      const success = isSuccess(record.responseStatus);
      if (success) ok++;

      this.log(`${i + 1}/${total} ${url} -> ${record.responseStatus}`, success ? "info" : "error");
      rows.push({ ...row, ...recordToColumns(record) });
    }

    const added = ENRICHMENT_COLUMNS.filter((c) => !input.columns.includes(c));
    writeTable(outputPath, {
      columns: [...input.columns, ...added],
      headers: [...(input.headers ?? input.columns), ...added],
      rows,
    });
    this.log(`saved -> ${outputPath}`);

    const summary: RunSummary = { rows: total, ok, failed: total - ok, outputPath };
    this.log(`done: ${summary.rows} rows processed (ok=${summary.ok}, failed=${summary.failed})`);
    return summary;
  }

  // WhatCmsClient nunca lanza; otras implementaciones de TechLookup podrían
  private async lookup(url: string): Promise<TechRecord> {
    try {
      return await this.client.fetch(url);
    } catch (e) {
      return createTechRecord(url, { responseStatus: statusError(errorMessage(e)) });
    }
  }
}
