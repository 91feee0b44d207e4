/**
 * XML Response Parser
 *
 * Parses XML/SOAP response bodies captured in live observations into a
 * JavaScript object that can be fed to schema inference.
 */

import { XMLParser } from 'fast-xml-parser';
import { ErrorCode, ParseError } from '../core/errors';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseAttributeValue: true,
  parseTagValue: true,
  trimValues: true,
});

/**
 * Parse an XML string into a JavaScript object.
 */
export function parseXml(input: string): unknown {
  try {
    return xmlParser.parse(input, true);
  } catch (error) {
    throw new ParseError(
      `Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.PARSE_SYNTAX_ERROR
    );
  }
}

/**
 * Check if a string looks like XML.
 */
export function isXml(input: string): boolean {
  const trimmed = input.trim();
  return trimmed.startsWith('<') && trimmed.endsWith('>');
}
