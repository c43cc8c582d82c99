/**
 * Placeholder scanning for `${...}` spans.
 *
 * Spans may nest (`${token_${env}}`); the scanner returns only the outermost
 * spans and leaves the inner ones to whoever resolves the content.
 */

export interface PlaceholderSpan {
  /** Index of the `$` */
  start: number;
  /** Index one past the closing `}` */
  end: number;
  /** Raw text between the braces */
  content: string;
}

export class PlaceholderSyntaxError extends Error {
  constructor(
    message: string,
    readonly input: string,
    readonly index: number,
  ) {
    super(message);
    this.name = 'PlaceholderSyntaxError';
  }
}

const OPEN = '${';

export function scanPlaceholders(input: string): PlaceholderSpan[] {
  const spans: PlaceholderSpan[] = [];
  let cursor = input.indexOf(OPEN);

  while (cursor !== -1) {
    const start = cursor;
    let depth = 1;
    let i = start + OPEN.length;

    for (; i < input.length && depth > 0; i++) {
      const ch = input[i];
      if (ch === '{') depth++;
      else if (ch === '}') depth--;
    }

    if (depth > 0) {
      throw new PlaceholderSyntaxError(
        `Unterminated placeholder starting at index ${start}: "${input.slice(start, start + 24)}"`,
        input,
        start,
      );
    }

    const content = input.slice(start + OPEN.length, i - 1);
    if (content.trim() === '') {
      throw new PlaceholderSyntaxError(`Empty placeholder at index ${start}`, input, start);
    }

    spans.push({ start, end: i, content });
    cursor = input.indexOf(OPEN, i);
  }

  return spans;
}

export function hasPlaceholder(input: string): boolean {
  return input.includes(OPEN);
}

/** True when the whole string is exactly one placeholder, e.g. `${count}`. */
export function isWholePlaceholder(input: string): boolean {
  if (!input.startsWith(OPEN) || !input.endsWith('}')) return false;
  const spans = scanPlaceholders(input);
  return spans.length === 1 && spans[0].start === 0 && spans[0].end === input.length;
}

const GENERATOR_PREFIX = 'fake.';

export function isGeneratorCall(content: string): boolean {
  return content.trim().startsWith(GENERATOR_PREFIX);
}

/**
 * Names referenced directly by a string, ignoring generator calls and
 * names that are themselves built from other placeholders.
 */
export function referencedNames(input: string): string[] {
  const names: string[] = [];
  for (const span of scanPlaceholders(input)) {
    const content = span.content.trim();
    if (isGeneratorCall(content)) {
      names.push(...referencedNames(content));
      continue;
    }
    if (hasPlaceholder(content)) {
      names.push(...referencedNames(content));
      continue;
    }
    names.push(content);
  }
  return names;
}
