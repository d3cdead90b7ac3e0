import type { CanonicalBody, FormEntry, JsonValue, XmlNode } from '../types.js';

function xmlToJson(node: XmlNode): JsonValue {
  return {
    name: node.name,
    attributes: { ...node.attributes },
    children: node.children.map(xmlToJson),
    text: node.text,
  };
}

function formToJson(entries: FormEntry[]): JsonValue {
  const result: { [key: string]: JsonValue } = {};

  for (const [key, value] of entries) {
    const existing = result[key];

    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      result[key] = [existing, value];
    }
  }

  return result;
}

/**
 * Projects any canonical body onto plain JSON, for plugin code that only
 * deals in records. Repeated form keys collapse into arrays.
 */
export function canonicalToJson(body: CanonicalBody): JsonValue {
  switch (body.kind) {
    case 'json':
      return body.value;
    case 'xml':
      return xmlToJson(body.root);
    case 'form':
      return formToJson(body.entries);
    case 'text':
      return { text: body.text, mediaType: body.mediaType };
    case 'raw':
      return {
        contentType: body.contentType ?? null,
        base64: Buffer.from(body.bytes).toString('base64'),
      };
  }
}
