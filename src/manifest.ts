// Service manifest of the reconciliation API

import { EntityStore } from "./entity-store.js";
import { createLogger } from "./logger.js";
import { Type } from "./types.js";

const logger = createLogger("Manifest");

export const API_VERSIONS = ["0.1", "0.2"];
const ID_PLACEHOLDER = "{{id}}";

export interface ServiceDefinition {
  service_url: string;
  service_path: string;
}

export interface ManifestType {
  id: string;
  name: string;
  description?: string;
}

export interface Manifest {
  versions: string[];
  name: string;
  identifierSpace: string;
  schemaSpace: string;
  defaultTypes: ManifestType[];
  view?: { url: string };
  suggest: {
    entity: ServiceDefinition;
    type: ServiceDefinition;
    property: ServiceDefinition;
  };
  extend: {
    propose_properties: ServiceDefinition;
  };
}

/**
 * Normalises a URL template to the `{{id}}` placeholder. Accepts `{{id}}`,
 * `${id}` and a printf-style `%s`; returns null when none is present.
 */
export function normalizeUrlTemplate(template: string): string | null {
  if (template.includes(ID_PLACEHOLDER)) return template;
  if (template.includes("${id}")) return template.split("${id}").join(ID_PLACEHOLDER);
  if (template.includes("%s")) return template.split("%s").join(ID_PLACEHOLDER);
  return null;
}

export function applyUrlTemplate(template: string, id: string): string {
  return (normalizeUrlTemplate(template) ?? template).split(ID_PLACEHOLDER).join(id);
}

export function toManifestType(type: Type): ManifestType {
  return type.description ? { id: type.id, name: type.name, description: type.description } : { id: type.id, name: type.name };
}

export function buildManifest(store: EntityStore, publicUrl: string, prefix: string): Manifest {
  const serviceUrl = publicUrl.replace(/\/+$/, "") + prefix;
  const at = (path: string): ServiceDefinition => ({ service_url: serviceUrl, service_path: path });

  const manifest: Manifest = {
    versions: API_VERSIONS,
    name: store.name(),
    identifierSpace: store.identifierNamespace(),
    schemaSpace: store.schemaNamespace(),
    defaultTypes: store.types().map(toManifestType),
    suggest: {
      entity: at("/auto/entities"),
      type: at("/auto/types"),
      property: at("/auto/properties"),
    },
    extend: {
      propose_properties: at("/properties"),
    },
  };

  const template = store.viewURLTemplate();
  if (template !== "") {
    const url = normalizeUrlTemplate(template);
    if (url) {
      manifest.view = { url };
    } else {
      logger.warn(`View URL '${template}' has no {{id}} placeholder, leaving it out of the manifest`);
    }
  }
  return manifest;
}
