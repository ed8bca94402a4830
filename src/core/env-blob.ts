// src/core/env-blob.ts

const EXPORT_PREFIX = /^export\s+/;

/**
 * Parse a newline-separated `KEY=VALUE` blob.
 *
 * Blank lines and `#` comments are skipped, an `export ` prefix is accepted,
 * values are trimmed and lose one pair of matching quotes. Later keys win.
 */
export function parseEnv(text: string): Record<string, string> {
  const parsed = new Map<string, string>();

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }

    const key = line.slice(0, separator).replace(EXPORT_PREFIX, '').trim();
    if (!key) {
      continue;
    }
    parsed.set(key, unquote(line.slice(separator + 1).trim()));
  }

  // fromEntries defines own properties, so keys such as __proto__ survive
  return Object.fromEntries(parsed);
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}
