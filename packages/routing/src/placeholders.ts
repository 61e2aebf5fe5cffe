import { trimEnd, trimStart } from '@waypost/common';

export const DEFAULT_PLACEHOLDERS: Readonly<Record<string, string>> = {
  '{alpha}': '([a-zA-Z]+)',
  '{alphanum}': '([a-zA-Z0-9]+)',
  '{any}': '(.*)',
  '{hex}': '([0-9A-Fa-f]+)',
  '{int}': '([0-9]{1,18})',
  '{md5}': '([a-f0-9]{32})',
  '{num}': '([0-9]+)',
  '{port}': '([0-9]{1,4}|[1-5][0-9]{4}|6[0-4][0-9]{3}|65[0-4][0-9]{2}|655[0-2][0-9]|6553[0-5])',
  '{scheme}': '(https?)',
  '{segment}': '([^/]+)',
  '{subdomain}': '([^.]+)',
  '{title}': '([a-zA-Z0-9_-]+)',
  '{uuid}': '([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})',
};

/** Matches each capture group of a placeholder-expanded template. */
export const PLACEHOLDER_GROUP = /\([^)]+\)/g;

/**
 * `int`, `{int}` and `{{int}}` all name the `{int}` token.
 */
export function toPlaceholderToken(name: string): string {
  return `{${trimEnd(trimStart(name, '{'), '}')}}`;
}

export function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
