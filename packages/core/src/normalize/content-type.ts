type ParsedContentType = {
  mediaType: string;
  charset?: string;
};

type BodyFormat = 'json' | 'xml' | 'form' | 'text' | 'raw';

// Some APIs still label JSON payloads as script
const JSON_MEDIA_TYPES: ReadonlySet<string> = new Set(['application/json', 'application/javascript', 'text/javascript']);

/**
 * Lower-cases the media type and drops parameters other than charset.
 * `undefined` for an absent or blank header.
 */
function parseContentType(value: string | undefined): ParsedContentType | undefined {
  if (value === undefined) {
    return undefined;
  }

  const [rawMediaType = '', ...parameters] = value.split(';');
  const mediaType = rawMediaType.trim().toLowerCase();
  if (!mediaType) {
    return undefined;
  }

  for (const parameter of parameters) {
    const [name = '', rawValue = ''] = parameter.split('=', 2);
    if (name.trim().toLowerCase() === 'charset') {
      const charset = rawValue.trim().replace(/^"|"$/g, '').toLowerCase();
      return charset ? { mediaType, charset } : { mediaType };
    }
  }

  return { mediaType };
}

function bodyFormatFor(mediaType: string | undefined): BodyFormat {
  if (!mediaType) {
    return 'raw';
  }

  if (JSON_MEDIA_TYPES.has(mediaType) || mediaType.endsWith('+json')) {
    return 'json';
  }

  if (mediaType === 'application/xml' || mediaType === 'text/xml' || mediaType.endsWith('+xml')) {
    return 'xml';
  }

  if (mediaType === 'application/x-www-form-urlencoded') {
    return 'form';
  }

  if (mediaType.startsWith('text/') || mediaType === 'application/jwt') {
    return 'text';
  }

  return 'raw';
}

export type { ParsedContentType, BodyFormat };
export { parseContentType, bodyFormatFor };
