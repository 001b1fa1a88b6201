import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as zlib from "zlib";
import { afterAll, describe, expect, it } from "vitest";
import { LoadError } from "../errors.js";
import { FALLBACK_TYPE, loadFlatFile, parseFlatLines } from "../flatfile-loader.js";
import { FLAT_LINES } from "./fixtures.js";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "recon-flat-"));

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("parseFlatLines", () => {
  it("reads the header into metadata and types", () => {
    const contents = parseFlatLines(FLAT_LINES);
    expect(contents.metadata).toEqual({
      name: "Test People",
      identifierNamespace: "test:ids",
      schemaNamespace: "test:schema",
      viewUrl: "https://example.org/view/{{id}}",
    });
    expect(contents.defaultTypeId).toBe("person");
    expect(contents.records.filter((r) => r.kind === "type")).toHaveLength(2);
    expect(contents.records.filter((r) => r.kind === "row")).toHaveLength(7);
  });

  it("synthesizes a type when the header declares none", () => {
    const contents = parseFlatLines(["ns\tsource\tschema\t", "", "x1\tSomething\t\t{}"]);
    expect(contents.defaultTypeId).toBe(FALLBACK_TYPE.id);
    expect(contents.records[0]).toEqual({ kind: "type", type: FALLBACK_TYPE });
    expect(contents.records[1]).toEqual({ kind: "row", id: "x1", name: "Something", typeList: "", attributes: {} });
  });

  it("names the line of a short row", () => {
    expect(() => parseFlatLines(["ns\tsource\tschema\t[]", "x1\tSomething\tperson"])).toThrow(
      "Line 2: expected 4 tab-separated columns",
    );
  });

  it("rejects an empty fourth column", () => {
    expect(() => parseFlatLines(["ns\tsource\tschema\t[]", "", "x1\tSomething\tperson\t"])).toThrow(
      "Line 3: expected 4 tab-separated columns",
    );
  });

  it("rejects invalid JSON with its line number", () => {
    expect(() => parseFlatLines(["ns\tsource\tschema\t[]", "x1\tA\tperson\t{oops"])).toThrow(/^Line 2: invalid JSON/);
  });

  it("rejects attributes that are not an object", () => {
    expect(() => parseFlatLines(["ns\tsource\tschema\t[]", "x1\tA\tperson\t[1]"])).toThrow(
      "Line 2: 4th column must be a JSON object",
    );
  });

  it("requires a header", () => {
    expect(() => parseFlatLines(["", ""])).toThrow(LoadError);
  });

  it("splits only the first three tabs", () => {
    const contents = parseFlatLines(["ns\tsource\tschema\t[]", 'x1\tA\tperson\t{"note":\t"ab"}']);
    expect(contents.records[1]).toMatchObject({ attributes: { note: "ab" } });
  });
});

describe("loadFlatFile", () => {
  it("loads a plain file into a memory store", async () => {
    const file = path.join(dir, "people.tsv");
    fs.writeFileSync(file, FLAT_LINES.join("\n") + "\n");
    const store = await loadFlatFile(file);
    expect(store.size()).toBe(4);
    expect((await store.getEntity("book:b1"))?.name).toBe("The Hitchhiker's Guide");
  });

  it("loads a gzip-compressed file", async () => {
    const file = path.join(dir, "people.tsv.gz");
    fs.writeFileSync(file, zlib.gzipSync(FLAT_LINES.join("\r\n")));
    const store = await loadFlatFile(file);
    expect(store.propertiesFor("person").map((p) => p.id)).toEqual(["born", "nationality"]);
  });

  it("prefixes errors with the filename", async () => {
    const file = path.join(dir, "broken.tsv");
    fs.writeFileSync(file, "ns\tsource\tschema\t[]\nx1\tA\n");
    await expect(loadFlatFile(file)).rejects.toThrow(`${file}: Line 2: expected 4 tab-separated columns`);
  });

  it("reports unreadable files as load errors", async () => {
    await expect(loadFlatFile(path.join(dir, "missing.tsv"))).rejects.toBeInstanceOf(LoadError);
  });
});
