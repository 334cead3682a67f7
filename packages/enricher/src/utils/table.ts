// packages/enricher/src/utils/table.ts
import fs from "node:fs";
import path from "node:path";
import * as xlsx from "xlsx";
import { ConfigurationError, InputError, OutputError, errorMessage } from "../errors";
import type { Row, Table } from "../types";

const BOOK_TYPES: Record<string, xlsx.BookType> = {
  ".xlsx": "xlsx",
  ".xlsm": "xlsm",
  ".xls": "biff8",
  ".ods": "ods",
};

export const OUTPUT_SHEET_NAME = "Enriched";

const ext = (p: string) => path.extname(p).toLowerCase();

export const isSpreadsheet = (p: string) => ext(p) in BOOK_TYPES;

const cell = (v: unknown) => (v == null ? "" : String(v));

export const isWritableFormat = (p: string) => ext(p) === ".csv" || ext(p) in BOOK_TYPES;

// cabeceras repetidas o vacías: note, note_1 / __EMPTY, __EMPTY_1 (como sheet_to_json)
export function uniqueKeys(headers: readonly string[]): string[] {
  const seen = new Set<string>();
  return headers.map((h) => {
    const base = h || "__EMPTY";
    let key = base;
    for (let n = 1; seen.has(key); n++) key = `${base}_${n}`;
    seen.add(key);
    return key;
  });
}

function sheetToTable(sheet: xlsx.WorkSheet): Table {
  const aoa = xlsx.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: false,
    blankrows: false,
  });
  const [head = [], ...body] = aoa;
  const headers = head.map(cell);
  const columns = uniqueKeys(headers);
  const rows = body.map((values) => {
    const row: Row = {};
    columns.forEach((c, i) => {
      row[c] = cell(values[i]);
    });
    return row;
  });
  return { columns, headers, rows };
}

function readWorkbook(filePath: string, spreadsheet: boolean): xlsx.WorkBook {
  try {
    if (spreadsheet) return xlsx.read(fs.readFileSync(filePath), { type: "buffer" });
    // separador fijo: sin él SheetJS lo adivina y un ";" dentro de una URL parte la columna
    const text = fs.readFileSync(filePath, "utf8").replace(/^\uFEFF/, "");
    const opts: xlsx.ParsingOptions & { FS?: string } = {
      type: "string",
      raw: true,
      FS: ext(filePath) === ".tsv" ? "\t" : ",",
    };
    return xlsx.read(text, opts);
  } catch (e) {
    throw new InputError(`Cannot read input file ${filePath}: ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Loads the first row as header and every other row as a string record.
 * Spreadsheets need a sheet name; anything else is parsed as delimited text.
 */
export function readTable(filePath: string, sheetName?: string): Table {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`Input file not found: ${filePath}`);
  }

  const spreadsheet = isSpreadsheet(filePath);
  if (spreadsheet && !sheetName) {
    throw new ConfigurationError(`A sheet name is required to read ${filePath}`);
  }

  const wb = readWorkbook(filePath, spreadsheet);
  const name = spreadsheet ? sheetName : wb.SheetNames[0];
  const sheet = name ? wb.Sheets[name] : undefined;
  if (!sheet) {
    throw new ConfigurationError(`Sheet "${name ?? ""}" not found in ${filePath}`);
  }
  return sheetToTable(sheet);
}

export function writeTable(filePath: string, table: Table): void {
  const kind = ext(filePath);
  if (!isWritableFormat(filePath)) {
    throw new OutputError(`Unsupported output format: ${filePath}`);
  }

  const aoa = [table.headers ?? table.columns, ...table.rows.map((r) => table.columns.map((c) => r[c] ?? ""))];
  const sheet = xlsx.utils.aoa_to_sheet(aoa);

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    if (kind === ".csv") {
      fs.writeFileSync(filePath, xlsx.utils.sheet_to_csv(sheet) + "\n", "utf8");
      return;
    }
    const wb = xlsx.utils.book_new();
    xlsx.utils.book_append_sheet(wb, sheet, OUTPUT_SHEET_NAME);
    const buf: Buffer = xlsx.write(wb, { type: "buffer", bookType: BOOK_TYPES[kind] });
    fs.writeFileSync(filePath, buf);
  } catch (e) {
    throw new OutputError(`Cannot write output file ${filePath}: ${errorMessage(e)}`, { cause: e });
  }
}
