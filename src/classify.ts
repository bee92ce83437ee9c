/**
 * Static resource classification
 *
 * Decides whether an exchange is a static asset (images, scripts, fonts,
 * media, documents, archives) or a candidate for API capture. HTML
 * responses are never static; otherwise three independent signals are
 * checked in order: file extension, response content-type, then
 * well-known asset path segments.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { getHeader, mediaType } from './http.js';
import type { Classification, ClassificationReason, Exchange } from './types.js';

export interface StaticResourceRules {
  extensions: ReadonlySet<string>;
  contentTypes: readonly string[];
  pathPatterns: readonly string[];
}

const HTML_CONTENT_TYPES = new Set(['text/html', 'application/xhtml+xml']);

const staticResourcesSchema = z.object({
  extensions: z.array(z.string()),
  contentTypes: z.array(z.string()),
  pathPatterns: z.array(z.string()),
});

export type StaticResourceLists = z.infer<typeof staticResourcesSchema>;

let defaultLists: StaticResourceLists | undefined;

/**
 * Default lists shipped in data/static-resources.json
 */
export function loadDefaultStaticLists(): StaticResourceLists {
  if (!defaultLists) {
    const raw = readFileSync(new URL('../data/static-resources.json', import.meta.url), 'utf-8');
    defaultLists = staticResourcesSchema.parse(JSON.parse(raw));
  }
  return defaultLists;
}

/**
 * Build matching rules from plain lists. Entries are lower-cased; extensions
 * may be given with or without a leading dot.
 */
export function buildStaticRules(lists: StaticResourceLists): StaticResourceRules {
  return {
    extensions: new Set(lists.extensions.map(ext => ext.toLowerCase().replace(/^\./, ''))),
    contentTypes: lists.contentTypes.map(type => type.toLowerCase()),
    pathPatterns: lists.pathPatterns.map(pattern => pattern.toLowerCase()),
  };
}

/**
 * Extension of the last path segment, lower-cased, or null when it has none.
 */
export function pathExtension(path: string): string | null {
  const filename = path.toLowerCase().split('/').pop() ?? '';
  const dot = filename.lastIndexOf('.');
  if (dot < 0) return null;
  return filename.slice(dot + 1);
}

export function classifyWithReason(
  exchange: Exchange,
  rules: StaticResourceRules,
): { classification: Classification; reason: ClassificationReason } {
  const path = (exchange.path || '').toLowerCase();
  const contentType = exchange.response
    ? mediaType(getHeader(exchange.response.headers, 'content-type'))
    : '';

  // HTML pages are captured even behind asset-like paths or extensions
  if (HTML_CONTENT_TYPES.has(contentType)) {
    return { classification: 'candidate', reason: 'html' };
  }

  const extension = pathExtension(path);
  if (extension !== null && rules.extensions.has(extension)) {
    return { classification: 'static', reason: 'extension' };
  }

  if (contentType && rules.contentTypes.some(type => contentType.startsWith(type))) {
    return { classification: 'static', reason: 'content-type' };
  }

  if (rules.pathPatterns.some(pattern => path.includes(pattern))) {
    return { classification: 'static', reason: 'path' };
  }

  return { classification: 'candidate', reason: 'none' };
}

export function classify(exchange: Exchange, rules: StaticResourceRules): Classification {
  return classifyWithReason(exchange, rules).classification;
}
