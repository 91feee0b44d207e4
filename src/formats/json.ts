/**
 * JSON Parser
 *
 * Parses JSON text (specification documents, recorded response bodies).
 */

import { ErrorCode, ParseError } from '../core/errors';

/**
 * Line/column of a character offset.
 */
export function offsetToLineColumn(input: string, offset: number): { line: number; column: number } {
  const before = input.slice(0, offset);
  const lines = before.split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

/**
 * Parse a JSON string into a JavaScript value.
 * Handles BOM markers and trailing commas (lenient mode).
 */
export function parseJson(input: string): unknown {
  // Remove BOM if present
  let cleaned = input.trim();
  if (cleaned.charCodeAt(0) === 0xfeff) {
    cleaned = cleaned.substring(1);
  }

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    // Try lenient parsing: strip trailing commas
    try {
      const lenient = cleaned.replace(/,\s*([\]}])/g, '$1');
      return JSON.parse(lenient);
    } catch {
      const message = error instanceof Error ? error.message : String(error);
      const position = message.match(/position (\d+)/);
      const location = position ? offsetToLineColumn(cleaned, parseInt(position[1], 10)) : {};
      throw new ParseError(`Failed to parse JSON: ${message}`, ErrorCode.PARSE_SYNTAX_ERROR, location);
    }
  }
}

/**
 * Check if a string looks like JSON.
 */
export function isJson(input: string): boolean {
  const trimmed = input.trim();
  return (
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('[') && trimmed.endsWith(']'))
  );
}
