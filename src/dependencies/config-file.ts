/**
 * Build descriptor (`.cfg`) parsing
 *
 * Config files are line oriented `key = value` pairs. Only `input` entries
 * name member source files.
 */

const INPUT_KEY = 'input';

/**
 * Parse a single config line into a key and value
 *
 * Returns null unless the line contains exactly one `=`.
 */
export function parseConfigLine(line: string): { key: string; value: string } | null {
  const parts = line.split('=');
  if (parts.length !== 2) return null;

  const [key, value] = parts;
  if (key === undefined || value === undefined) return null;
  return { key: key.trim(), value: value.trim() };
}

/**
 * Extract the raw `input` references of a config file, in file order
 */
export function parseInputReferences(content: string): string[] {
  const references: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    const entry = parseConfigLine(line);
    if (entry !== null && entry.key === INPUT_KEY && entry.value !== '') {
      references.push(entry.value);
    }
  }

  return references;
}
