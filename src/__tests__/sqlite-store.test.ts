import Database from "better-sqlite3";
import { afterAll, describe, expect, it } from "vitest";
import { BackendError, MalformedQueryError } from "../errors.js";
import { SqliteStore } from "../sqlite-store.js";
import { createSqliteStore } from "./fixtures.js";

const store = createSqliteStore();

afterAll(async () => {
  await store.close();
});

describe("SqliteStore catalog", () => {
  it("reads metadata and types", () => {
    expect(store.name()).toBe("Test People");
    expect(store.identifierNamespace()).toBe("test:ids");
    expect(store.schemaNamespace()).toBe("test:schema");
    expect(store.viewURLTemplate()).toBe("https://example.org/view/{{id}}");
    expect(store.types().map((t) => t.id)).toEqual(["person", "book"]);
  });

  it("lists properties per type in insertion order", () => {
    expect(store.propertiesFor("person").map((p) => p.id)).toEqual(["born", "nationality"]);
    expect(store.propertiesFor("person")[0]?.description).toBe("Year of birth");
    expect(store.propertiesFor("unknown")).toEqual([]);
  });
});

describe("SqliteStore.query", () => {
  it("fast-tracks an exact raw key", async () => {
    const res = await store.query({ id: "q0", query: "q42", type: "book" });
    expect(res.id).toBe("q0");
    expect(res.result.map((c) => [c.id, c.name, c.score, c.match])).toEqual([["person:q42", "Douglas Adams", 100, true]]);
  });

  it("normalizes the first hit to the length ratio", async () => {
    const res = await store.query({ query: "Douglas" });
    expect(res.result.map((c) => c.id).sort()).toEqual(["person:q42", "person:q5"]);
    const [first, second] = res.result;
    if (!first || !second) throw new Error("expected two candidates");
    expect(first.score).toBeCloseTo(Math.max(7 / first.id.length, 7 / first.name.length) * 100);
    expect(second.score).toBeLessThanOrEqual(first.score);
    expect(second.score).toBeGreaterThan(0);
  });

  it("scores a single hit by the better of id and name ratio", async () => {
    // "Q42" misses the binary exact path but finds q42 through the index
    const res = await store.query({ query: "Q42" });
    expect(res.result.map((c) => c.id)).toEqual(["person:q42"]);
    expect(res.result[0]?.score).toBeCloseTo(30);
    expect(res.result[0]?.match).toBe(false);
  });

  it("drops candidates lacking the requested type", async () => {
    expect((await store.query({ query: "Douglas", type: "book" })).result).toEqual([]);
    expect((await store.query({ query: "Douglas", type: "person" })).result).toHaveLength(2);
  });

  it("keeps only entities holding every constrained value", async () => {
    const one = await store.query({
      query: "Douglas",
      properties: [
        { pid: "nationality", v: "british" },
        { pid: "born", v: "1952" },
      ],
    });
    expect(one.result.map((c) => c.id)).toEqual(["person:q42"]);
    expect(one.result[0]?.score).toBeCloseTo(70);

    const none = await store.query({
      query: "Douglas",
      properties: [
        { pid: "nationality", v: "british" },
        { pid: "born", v: "1945" },
      ],
    });
    expect(none.result).toEqual([]);
  });

  it("compares entity references by raw key", async () => {
    const res = await store.query({ query: "Guide", properties: [{ pid: "author", v: { id: "person:q42" } }] });
    expect(res.result.map((c) => c.id)).toEqual(["book:b1"]);
    expect(res.result[0]?.score).toBeCloseTo(500 / 7);
  });

  it("searches descriptions too", async () => {
    const res = await store.query({ query: "english" });
    expect(res.result.map((c) => c.id)).toEqual(["person:q42"]);
  });

  it("stops at the limit", async () => {
    expect((await store.query({ query: "Douglas", limit: 1 })).result).toHaveLength(1);
  });

  it("treats query text as literal tokens", async () => {
    expect((await store.query({ query: 'NEAR( "x OR' })).result).toEqual([]);
  });

  it("returns an empty list for blank text", async () => {
    expect((await store.query({ query: "" })).result).toEqual([]);
  });

  it("rejects malformed constraints", async () => {
    await expect(store.query({ query: "Douglas", properties: [{ pid: "author", v: { id: "" } }] })).rejects.toBeInstanceOf(
      MalformedQueryError,
    );
  });
});

describe("SqliteStore.getEntity", () => {
  it("returns the entity with its property values", async () => {
    const e = await store.getEntity("person:q42");
    expect(e).toMatchObject({ id: "person:q42", name: "Douglas Adams", description: "English writer" });
    expect(e?.properties).toEqual({ born: ["1952"], nationality: ["british"] });
  });

  it("is null for a type the entity does not hold", async () => {
    expect(await store.getEntity("book:q42")).toBeNull();
    expect(await store.getEntity("person:nobody")).toBeNull();
  });
});

describe("SqliteStore.queryPrefix", () => {
  it("matches name prefixes ordered by name", async () => {
    const found = await store.queryPrefix("Doug", 10);
    expect(found.map((e) => e.id)).toEqual(["person:q42", "person:q5"]);
  });

  it("treats LIKE wildcards literally", async () => {
    expect(await store.queryPrefix("%", 10)).toEqual([]);
  });
});

describe("SqliteStore failures", () => {
  it("rejects a missing database file", async () => {
    await expect(SqliteStore.open("/nonexistent/dir/recon.sqlite")).rejects.toBeInstanceOf(BackendError);
  });

  it("wraps driver errors raised while answering", async () => {
    const broken = createSqliteStore();
    await broken.close();
    await expect(broken.getEntity("person:q42")).rejects.toBeInstanceOf(BackendError);
  });

  it("refuses a database without the schema", () => {
    const db = new Database(":memory:");
    expect(() => SqliteStore.fromDatabase(db)).toThrow(BackendError);
    db.close();
  });
});
