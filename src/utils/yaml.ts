/**
 * YAML codec for the documents skillport persists: module manifests, origin
 * records, the installation registry and marketplace catalogs.
 */

import { dump, load } from 'js-yaml';

/**
 * Parse a YAML document. JSON is a subset of YAML, so JSON input parses too.
 * @throws The codec's error when the text is not well-formed YAML.
 */
export function parseYaml(raw: string): unknown {
  return load(raw);
}

/** Serialize a value as a block-style YAML document. Undefined fields are omitted. */
export function stringifyYaml(value: unknown): string {
  return dump(value, { noRefs: true, lineWidth: -1, skipInvalid: true });
}
