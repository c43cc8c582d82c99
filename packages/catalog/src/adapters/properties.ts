/**
 * Minimal `.properties` reader/writer: one `key=value` per line, `#` comments.
 * Whitespace around the key and directly after `=` is not part of the entry;
 * trailing whitespace is. Backslashes, line breaks, tabs and leading spaces
 * inside values are escaped so every value reads back as written.
 */

export function parseProperties(content: string): Record<string, string> {
  const properties: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trimStart();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    if (!key) continue;
    properties[key] = unescapeValue(line.slice(eq + 1).trimStart());
  }

  return properties;
}

export function formatProperties(properties: Record<string, string>, header?: string): string {
  const lines: string[] = [];
  if (header) lines.push(`# ${header}`);
  for (const [key, value] of Object.entries(properties)) {
    lines.push(`${key}=${escapeValue(value)}`);
  }
  return lines.join('\n') + '\n';
}

function escapeValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/^ +/, (spaces) => '\\ '.repeat(spaces.length));
}

function unescapeValue(value: string): string {
  return value.replace(/\\(\\|n|r|t| )/g, (_match, ch: string) => {
    if (ch === 'n') return '\n';
    if (ch === 'r') return '\r';
    if (ch === 't') return '\t';
    return ch;
  });
}
