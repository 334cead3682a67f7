import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as xlsx from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigurationError, InputError, OutputError } from "../errors";
import { OUTPUT_SHEET_NAME, isSpreadsheet, readTable, uniqueKeys, writeTable } from "../utils/table";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "techscan-table-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeWorkbook(file: string, sheetName: string, aoa: unknown[][]) {
  const wb = xlsx.utils.book_new();
  xlsx.utils.book_append_sheet(wb, xlsx.utils.aoa_to_sheet(aoa), sheetName);
  fs.writeFileSync(file, xlsx.write(wb, { type: "buffer", bookType: "xlsx" }));
}

describe("readTable", () => {
  it("reads CSV rows as text keyed by header", () => {
    const file = path.join(dir, "in.csv");
    fs.writeFileSync(file, 'name,url,zip\nKingdom,kingdommin.org,00123\n"Acme, Inc",acme.test,42\n');

    expect(readTable(file)).toEqual({
      columns: ["name", "url", "zip"],
      headers: ["name", "url", "zip"],
      rows: [
        { name: "Kingdom", url: "kingdommin.org", zip: "00123" },
        { name: "Acme, Inc", url: "acme.test", zip: "42" },
      ],
    });
  });

  it("reads the named sheet of a workbook", () => {
    const file = path.join(dir, "in.xlsx");
    writeWorkbook(file, "WHATCMS INPUT", [
      ["url", "employees"],
      ["kingdommin.org", 12],
    ]);

    expect(readTable(file, "WHATCMS INPUT")).toEqual({
      columns: ["url", "employees"],
      headers: ["url", "employees"],
      rows: [{ url: "kingdommin.org", employees: "12" }],
    });
  });

  it("keeps semicolons inside comma-separated values", () => {
    const file = path.join(dir, "in.csv");
    fs.writeFileSync(file, "url\nhttps://a.test/shop;jsessionid=abc\nb.test\n");

    expect(readTable(file)).toEqual({
      columns: ["url"],
      headers: ["url"],
      rows: [{ url: "https://a.test/shop;jsessionid=abc" }, { url: "b.test" }],
    });
  });

  it("splits .tsv files on tabs only", () => {
    const file = path.join(dir, "in.tsv");
    fs.writeFileSync(file, "name\turl\nAcme, Inc\thttps://a.test/x;y\n");

    expect(readTable(file).rows).toEqual([{ name: "Acme, Inc", url: "https://a.test/x;y" }]);
  });

  it("gives repeated and blank headers their own keys", () => {
    const file = path.join(dir, "in.csv");
    fs.writeFileSync(file, "note,url,note,,\nfirst,a.test,second,x,y\n");

    const table = readTable(file);
    expect(table.headers).toEqual(["note", "url", "note", "", ""]);
    expect(table.columns).toEqual(["note", "url", "note_1", "__EMPTY", "__EMPTY_1"]);
    expect(table.rows).toEqual([{ note: "first", url: "a.test", note_1: "second", __EMPTY: "x", __EMPTY_1: "y" }]);
  });

  it("requires a sheet name for workbooks", () => {
    const file = path.join(dir, "in.xlsx");
    writeWorkbook(file, "WHATCMS INPUT", [["url"], ["a.test"]]);

    expect(() => readTable(file)).toThrow(ConfigurationError);
    expect(() => readTable(file, "Sheet1")).toThrow('Sheet "Sheet1" not found');
  });

  it("fails with InputError when the file is missing", () => {
    expect(() => readTable(path.join(dir, "nope.csv"))).toThrow(InputError);
  });

  it("detects spreadsheet extensions", () => {
    expect(isSpreadsheet("data/in.XLSX")).toBe(true);
    expect(isSpreadsheet("data/in.ods")).toBe(true);
    expect(isSpreadsheet("data/in.csv")).toBe(false);
    expect(isSpreadsheet("data/in")).toBe(false);
  });
});

describe("uniqueKeys", () => {
  it("suffixes repeats without clashing with existing names", () => {
    expect(uniqueKeys(["a", "a_1", "a", ""])).toEqual(["a", "a_1", "a_2", "__EMPTY"]);
  });
});

describe("writeTable", () => {
  const table = {
    columns: ["url", "Blog_CMS", "whatcms_response"],
    rows: [{ url: "kingdommin.org", Blog_CMS: "WordPress, Elementor 3.1", whatcms_response: "200 - Success" }],
  };

  it("writes CSV and creates missing directories", () => {
    const file = path.join(dir, "out", "nested", "enriched.csv");
    writeTable(file, table);

    expect(fs.readFileSync(file, "utf8")).toBe(
      'url,Blog_CMS,whatcms_response\nkingdommin.org,"WordPress, Elementor 3.1",200 - Success\n'
    );
  });

  it("writes a workbook with an Enriched sheet", () => {
    const file = path.join(dir, "enriched.xlsx");
    writeTable(file, table);

    const wb = xlsx.read(fs.readFileSync(file), { type: "buffer" });
    expect(wb.SheetNames).toEqual([OUTPUT_SHEET_NAME]);
    expect(readTable(file, OUTPUT_SHEET_NAME)).toEqual({ ...table, headers: table.columns });
  });

  it("writes header text while reading values by key", () => {
    const file = path.join(dir, "dup.csv");
    writeTable(file, {
      columns: ["note", "url", "note_1"],
      headers: ["note", "url", "note"],
      rows: [{ note: "first", url: "a.test", note_1: "second" }],
    });

    expect(fs.readFileSync(file, "utf8")).toBe("note,url,note\nfirst,a.test,second\n");
  });

  it("rejects unknown output formats", () => {
    expect(() => writeTable(path.join(dir, "out.json"), table)).toThrow(OutputError);
  });

  it("fails with OutputError when the destination is not writable", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    expect(() => writeTable(path.join(blocker, "out.csv"), table)).toThrow(OutputError);
  });
});
