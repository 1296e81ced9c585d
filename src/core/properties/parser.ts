/**
 * Line-oriented parser for Java-properties style text.
 *
 * Supports `#`/`!` comments, backslash line continuation, `key=value` pairs
 * split at the first unescaped `=`, and `%profile.` key prefixes. Malformed
 * lines are collected as errors and never stop the parse.
 */
import { ErrorCodes } from '../../utils/errors.js';
import { BASE_PROFILE, type ParsedProperties, type PropertyEntry, type PropertyParseError } from './types.js';

const KEY_ESCAPES: Record<string, string> = {
  t: '\t',
  n: '\n',
  r: '\r',
  f: '\f',
};

interface LogicalLine {
  text: string;
  lineNumber: number;
}

/**
 * Parse properties text into entries (file order) and structural errors.
 */
export function parseProperties(text: string): ParsedProperties {
  const entries: PropertyEntry[] = [];
  const errors: PropertyParseError[] = [];

  for (const logical of readLogicalLines(text)) {
    const result = parseLine(logical);
    if ('error' in result) {
      errors.push(result.error);
    } else {
      entries.push(result.entry);
    }
  }

  return { entries, errors };
}

/**
 * Yield logical lines: comments and blanks dropped, continuations joined.
 */
function* readLogicalLines(text: string): Generator<LogicalLine> {
  const physical = text.split(/\r\n|\r|\n/);
  let i = 0;

  while (i < physical.length) {
    const lineNumber = i + 1;
    let current = physical[i].trimStart();
    i++;

    if (current === '' || current.startsWith('#') || current.startsWith('!')) {
      continue;
    }

    while (endsWithContinuation(current)) {
      current = current.slice(0, -1);
      if (i >= physical.length) break;
      current += physical[i].trimStart();
      i++;
    }

    yield { text: current, lineNumber };
  }
}

/**
 * A line continues when it ends in an odd number of backslashes.
 */
export function endsWithContinuation(line: string): boolean {
  let count = 0;
  for (let i = line.length - 1; i >= 0 && line[i] === '\\'; i--) {
    count++;
  }
  return count % 2 === 1;
}

/**
 * Index of the first `=` not preceded by an escaping backslash, or -1.
 */
export function findSeparator(line: string): number {
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === '=') return i;
  }
  return -1;
}

/**
 * Resolve backslash escapes in a key (`\=`, `\:`, `\ `, `\\`, `\t`, ...).
 */
export function unescapeKey(raw: string): string {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '\\' && i + 1 < raw.length) {
      const next = raw[i + 1];
      out += KEY_ESCAPES[next] ?? next;
      i++;
    } else {
      out += ch;
    }
  }
  return out;
}

function parseLine({ text, lineNumber }: LogicalLine): { entry: PropertyEntry } | { error: PropertyParseError } {
  const line = text.trim();
  const separator = findSeparator(line);

  if (separator === -1) {
    return {
      error: {
        code: ErrorCodes.MISSING_SEPARATOR,
        lineNumber,
        line,
        message: `'${line}' does not match 'key=value' format`,
      },
    };
  }

  const fullKey = unescapeKey(line.slice(0, separator).trim());
  const rawValue = line.slice(separator + 1).trim();

  if (fullKey === '') {
    return {
      error: { code: ErrorCodes.EMPTY_KEY, lineNumber, line, message: 'Property key is empty' },
    };
  }

  if (!fullKey.startsWith('%')) {
    return { entry: { profile: BASE_PROFILE, key: fullKey, rawValue, lineNumber } };
  }

  const dot = fullKey.indexOf('.');
  const profile = dot === -1 ? '' : fullKey.slice(1, dot);
  if (profile === '') {
    return {
      error: {
        code: ErrorCodes.EMPTY_PROFILE,
        lineNumber,
        line,
        message: `Profile prefix in '${fullKey}' must have the form %<profile>.<key>`,
      },
    };
  }

  const key = fullKey.slice(dot + 1);
  if (key === '') {
    return {
      error: {
        code: ErrorCodes.EMPTY_KEY,
        lineNumber,
        line,
        message: `Property key after profile prefix '%${profile}.' is empty`,
      },
    };
  }

  return { entry: { profile, key, rawValue, lineNumber } };
}
