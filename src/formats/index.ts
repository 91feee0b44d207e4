/**
 * Format parsers
 */

import { isJson, parseJson } from './json';
import { isXml, parseXml } from './xml';
import { parseYaml } from './yaml';

export { parseJson, isJson, offsetToLineColumn } from './json';
export { parseXml, isXml } from './xml';
export { parseYaml } from './yaml';

/**
 * Parse a specification or configuration document: JSON when it looks like
 * JSON, YAML otherwise (YAML is a superset, but JSON errors read better).
 */
export function parseDocumentText(input: string): unknown {
  return isJson(input) ? parseJson(input) : parseYaml(input);
}

/**
 * Parse a recorded response body. JSON and XML are decoded; any other text
 * is kept as a plain string value.
 */
export function parseBody(input: string): unknown {
  const trimmed = input.trim();
  if (trimmed.length === 0) return undefined;

  if (isJson(trimmed)) {
    return parseJson(trimmed);
  }

  if (isXml(trimmed)) {
    return parseXml(trimmed);
  }

  // Bare JSON scalars ("42", "true", "\"text\"")
  try {
    return JSON.parse(trimmed);
  } catch {
    return input;
  }
}
