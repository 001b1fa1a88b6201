import { describe, expect, it } from "vitest";
import { applyUrlTemplate, buildManifest, normalizeUrlTemplate } from "../manifest.js";
import { MemoryStore } from "../memory-store.js";
import { createMemoryStore } from "./fixtures.js";

function storeWithView(viewUrl: string): MemoryStore {
  return MemoryStore.fromRecords([{ kind: "type", type: { id: "thing", name: "Thing", description: "Any thing" } }], {
    metadata: { name: "Things", identifierNamespace: "ids", schemaNamespace: "schema", viewUrl },
  });
}

describe("URL templates", () => {
  it("normalizes placeholders to {{id}}", () => {
    expect(normalizeUrlTemplate("https://example.org/e/{{id}}")).toBe("https://example.org/e/{{id}}");
    expect(normalizeUrlTemplate("https://example.org/e/${id}")).toBe("https://example.org/e/{{id}}");
    expect(normalizeUrlTemplate("https://example.org/e/%s")).toBe("https://example.org/e/{{id}}");
    expect(normalizeUrlTemplate("https://example.org/e/")).toBeNull();
  });

  it("substitutes the id", () => {
    expect(applyUrlTemplate("https://example.org/e/${id}", "person:q42")).toBe("https://example.org/e/person:q42");
  });
});

describe("buildManifest", () => {
  it("roots the service definitions at the public URL and prefix", () => {
    const manifest = buildManifest(createMemoryStore(), "http://localhost:8080/", "/api");
    expect(manifest).toEqual({
      versions: ["0.1", "0.2"],
      name: "Test People",
      identifierSpace: "test:ids",
      schemaSpace: "test:schema",
      defaultTypes: [
        { id: "person", name: "Person" },
        { id: "book", name: "Book" },
      ],
      view: { url: "https://example.org/view/{{id}}" },
      suggest: {
        entity: { service_url: "http://localhost:8080/api", service_path: "/auto/entities" },
        type: { service_url: "http://localhost:8080/api", service_path: "/auto/types" },
        property: { service_url: "http://localhost:8080/api", service_path: "/auto/properties" },
      },
      extend: {
        propose_properties: { service_url: "http://localhost:8080/api", service_path: "/properties" },
      },
    });
  });

  it("translates ${id} view templates", () => {
    const manifest = buildManifest(storeWithView("https://example.org/e/${id}"), "http://h", "/api");
    expect(manifest.view).toEqual({ url: "https://example.org/e/{{id}}" });
    expect(manifest.defaultTypes).toEqual([{ id: "thing", name: "Thing", description: "Any thing" }]);
  });

  it("leaves out a view without placeholder or template", () => {
    expect(buildManifest(storeWithView("https://example.org/e/"), "http://h", "/api").view).toBeUndefined();
    expect(buildManifest(storeWithView(""), "http://h", "/api").view).toBeUndefined();
  });
});
