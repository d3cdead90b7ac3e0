import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { DecodeError } from '../errors.js';
import type { XmlNode } from '../types.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNode(entry: Record<string, unknown>): XmlNode | undefined {
  const name = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
  if (name === undefined || name === TEXT_KEY) {
    return undefined;
  }

  const attributes: Record<string, string> = {};
  const rawAttributes = entry[ATTRIBUTES_KEY];
  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      attributes[key] = String(value);
    }
  }

  const children: XmlNode[] = [];
  const textParts: string[] = [];
  const content = entry[name];

  if (Array.isArray(content)) {
    for (const child of content) {
      if (!isRecord(child)) {
        continue;
      }

      if (TEXT_KEY in child) {
        textParts.push(String(child[TEXT_KEY]));
        continue;
      }

      const node = toNode(child);
      if (node) {
        children.push(node);
      }
    }
  }

  return { name, attributes, children, text: textParts.join('') };
}

/**
 * Parses a document into its root element.
 * Throws `DecodeError` of kind `malformed-xml` on invalid input.
 */
export function parseXml(text: string): XmlNode {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { line, msg } = validation.err;
    throw new DecodeError('malformed-xml', `Malformed XML at line ${line}: ${msg}`);
  }

  const parsed: unknown = parser.parse(text);
  const entries = Array.isArray(parsed) ? parsed : [];

  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }

    const root = toNode(entry);
    if (root) {
      return root;
    }
  }

  throw new DecodeError('malformed-xml', 'XML document has no root element');
}
