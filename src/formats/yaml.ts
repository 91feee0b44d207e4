/**
 * YAML Parser
 *
 * Parses YAML specification documents and configuration files.
 */

import { parse, YAMLParseError } from 'yaml';
import { ErrorCode, ParseError } from '../core/errors';

export function parseYaml(input: string): unknown {
  try {
    return parse(input);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ParseError(`Failed to parse YAML: ${error.message.split('\n')[0]}`, ErrorCode.PARSE_SYNTAX_ERROR, {
        line: pos?.line,
        column: pos?.col,
      });
    }
    throw new ParseError(
      `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.PARSE_SYNTAX_ERROR
    );
  }
}
