import * as yaml from "js-yaml";

/**
 * Parse a YAML document. Throws js-yaml's YAMLException on malformed input.
 */
export function fromYaml(yamlContent: string): unknown {
  return yaml.load(yamlContent);
}

/**
 * Convert a value to a YAML document with stable key order
 */
export function toYaml(content: unknown): string {
  return yaml.dump(content, {
    skipInvalid: true,
    noRefs: true,
    sortKeys: true,
  });
}
