// ── Capture / assert expression syntax ──────────────────────────────
//
//   @status
//   @time
//   @headers['Content-Type']      @headers["X-Id"]      @headers X-Id
//   @body
//   @body jsonpath $.data.id
//   @body xpath //order/id
//   @body regex id=(\d+)
//
// Assertions append an optional operator and expected value, either pipe
// style `@status |==| 200` or bracket style `@status [==] 200`.

export type SourceExpression =
  | { kind: 'status' }
  | { kind: 'time' }
  | { kind: 'header'; name: string }
  | { kind: 'body' }
  | { kind: 'jsonpath'; path: string }
  | { kind: 'xpath'; path: string }
  | { kind: 'regex'; pattern: string };

export const ASSERT_OPERATORS = ['==', '!=', '>', '<', 'contains', '!contains'] as const;

export type AssertOperator = (typeof ASSERT_OPERATORS)[number];

export interface AssertExpression {
  source: SourceExpression;
  /** null means "present and not null" */
  operator: AssertOperator | null;
  /** Raw expected text with surrounding quotes removed; may hold placeholders */
  expected: string | null;
}

export class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    readonly expression: string,
  ) {
    super(message);
    this.name = 'ExpressionSyntaxError';
  }
}

const HEADER_BRACKET_RE = /^@headers\s*\[\s*(['"])(.+?)\1\s*\]$/;
const HEADER_BARE_RE = /^@headers\s+(\S.*)$/;
const JSONPATH_RE = /^@body\s+jsonpath\s+(\S.*)$/;
const XPATH_RE = /^@body\s+xpath\s+(\S.*)$/;
const REGEX_RE = /^@body\s+regex\s+(\S.*)$/;

const OPERATOR_GROUP = '!contains|contains|==|!=|>|<';
const PIPE_OPERATOR_RE = new RegExp(`\\|\\s*(${OPERATOR_GROUP})\\s*\\|`);
const BRACKET_OPERATOR_RE = new RegExp(`\\[\\s*(${OPERATOR_GROUP})\\s*\\]`);

export function parseSourceExpression(expression: string): SourceExpression {
  const expr = expression.trim();

  if (expr === '@status') return { kind: 'status' };
  if (expr === '@time') return { kind: 'time' };
  if (expr === '@body') return { kind: 'body' };

  const bracketHeader = expr.match(HEADER_BRACKET_RE);
  if (bracketHeader) return { kind: 'header', name: bracketHeader[2].trim() };

  const bareHeader = expr.match(HEADER_BARE_RE);
  if (bareHeader) return { kind: 'header', name: bareHeader[1].trim() };

  const jsonpath = expr.match(JSONPATH_RE);
  if (jsonpath) return { kind: 'jsonpath', path: jsonpath[1].trim() };

  const xpath = expr.match(XPATH_RE);
  if (xpath) return { kind: 'xpath', path: xpath[1].trim() };

  const regex = expr.match(REGEX_RE);
  if (regex) {
    const pattern = regex[1].trim();
    try {
      new RegExp(pattern);
    } catch (err) {
      throw new ExpressionSyntaxError(
        `Invalid regex in "${expr}": ${err instanceof Error ? err.message : String(err)}`,
        expression,
      );
    }
    return { kind: 'regex', pattern };
  }

  throw new ExpressionSyntaxError(
    `Unknown source in "${expr}" (expected @status, @time, @headers, @body, @body jsonpath, @body xpath or @body regex)`,
    expression,
  );
}

export function parseAssertExpression(expression: string): AssertExpression {
  const expr = expression.trim();

  const match = expr.match(PIPE_OPERATOR_RE) ?? expr.match(BRACKET_OPERATOR_RE);
  if (!match || match.index === undefined) {
    return { source: parseSourceExpression(expr), operator: null, expected: null };
  }

  const left = expr.slice(0, match.index).trim();
  const right = expr.slice(match.index + match[0].length).trim();

  return {
    source: parseSourceExpression(left),
    operator: toOperator(match[1]),
    expected: stripQuotes(right),
  };
}

function toOperator(token: string): AssertOperator {
  const operator = ASSERT_OPERATORS.find((op) => op === token);
  if (!operator) {
    throw new ExpressionSyntaxError(`Unsupported operator "${token}"`, token);
  }
  return operator;
}

export function stripQuotes(raw: string): string {
  const value = raw.trim();
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}
