/**
 * Prompt Description Loader
 *
 * Loads tool descriptions from markdown files that sit next to the module asking for them,
 * with optional template variable substitution.
 *
 * Core Exports:
 * - loadDesc: Loads a markdown file and optionally replaces template variables
 */

import { readFileSync } from 'node:fs';

/**
 * Load a tool description from a markdown file, with optional substitutions.
 *
 * @param fileName - File name relative to `baseUrl`
 * @param baseUrl - Usually the caller's `import.meta.url`
 * @param substitutions - Key-value pairs for `${VAR_NAME}` placeholders (e.g., { "TIMEOUT_SECONDS": "120" })
 */
export function loadDesc(
  fileName: string,
  baseUrl: string | URL,
  substitutions?: Record<string, string>
): string {
  let content = readFileSync(new URL(fileName, baseUrl), 'utf-8');
  if (substitutions) {
    for (const [key, value] of Object.entries(substitutions)) {
      content = content.replaceAll(`\${${key}}`, value);
    }
  }
  return content.trim();
}
