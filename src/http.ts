/**
 * Small helpers for reading exchange headers and bodies
 */

/**
 * Case-insensitive header lookup. Returns '' when absent.
 */
export function getHeader(headers: Record<string, string> | undefined, name: string): string {
  if (!headers) return '';
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return '';
}

/**
 * Media type without parameters, lower-cased: "Text/HTML; charset=utf-8" -> "text/html"
 */
export function mediaType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

const utf8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Best-effort UTF-8 decode; invalid sequences become U+FFFD, missing bodies ''.
 */
export function decodeBody(body: Buffer | null | undefined): string {
  if (!body || body.length === 0) return '';
  try {
    return utf8.decode(body);
  } catch {
    return '';
  }
}
