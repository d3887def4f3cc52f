/**
 * Embedding Protocol
 *
 * Recognizes and parses the one construct every backend shares:
 *
 *   marker.embed('run_mode', param_name, "literal", ...)
 *
 * `marker` is the configured call marker (default `cgiapp`), compared
 * case-sensitively. `dispatch` may be used in place of `embed`.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createConfigurationError,
  createMalformedCallError,
  type ConfigurationError,
  type MalformedCallError,
} from './errors.js';
import {
  EMBED_METHODS,
  IDENTIFIER_PATTERN,
  type CallArg,
  type EmbedMethod,
  type EmbeddedCall,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Character Classes
// ─────────────────────────────────────────────────────────────────────────────

const isWhitespace = (ch: string): boolean => ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';

const isIdentStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);

const isIdentChar = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);

const isQuote = (ch: string): boolean => ch === "'" || ch === '"';

const isEmbedMethod = (name: string): name is EmbedMethod =>
  EMBED_METHODS.some((method) => method === name);

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export const isValidIdentifier = (name: string): boolean => IDENTIFIER_PATTERN.test(name);

/**
 * Checks a configured call marker name.
 */
export const validateEmbedTagName = (name: string): Result<string, ConfigurationError> => {
  if (!isValidIdentifier(name)) {
    return err(
      createConfigurationError(
        `Invalid embed_tag_name "${name}": must contain only letters, digits and underscores, and not start with a digit`,
        'embedTagName'
      )
    );
  }
  return ok(name);
};

// ─────────────────────────────────────────────────────────────────────────────
// Scanner
// ─────────────────────────────────────────────────────────────────────────────

class Cursor {
  pos = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipWhitespace(): void {
    while (!this.done && isWhitespace(this.peek())) this.pos++;
  }

  readIdentifier(): string {
    const start = this.pos;
    if (this.done || !isIdentStart(this.peek())) return '';
    while (!this.done && isIdentChar(this.peek())) this.pos++;
    return this.text.slice(start, this.pos);
  }
}

type ArgState = 'beforeArg' | 'afterArg' | 'closed';

/**
 * Consumes `marker . method` at the cursor.
 * Returns the method name, or null when the text is not a call for this marker.
 */
const readCallHead = (cursor: Cursor, marker: string): EmbedMethod | null => {
  cursor.skipWhitespace();
  if (cursor.readIdentifier() !== marker) return null;

  cursor.skipWhitespace();
  if (cursor.peek() !== '.') return null;
  cursor.pos++;

  cursor.skipWhitespace();
  const method = cursor.readIdentifier();
  return isEmbedMethod(method) ? method : null;
};

/**
 * Parses the parenthesized argument list that follows the call head.
 */
const readArgList = (cursor: Cursor, text: string): Result<CallArg[], MalformedCallError> => {
  cursor.skipWhitespace();
  if (cursor.peek() !== '(') {
    return err(createMalformedCallError(text, "expected '(' after method name"));
  }
  cursor.pos++;

  const args: CallArg[] = [];
  let state: ArgState = 'beforeArg';
  let sawComma = false;

  while (state !== 'closed') {
    cursor.skipWhitespace();
    if (cursor.done) {
      return err(createMalformedCallError(text, "missing ')'"));
    }
    const ch = cursor.peek();

    if (state === 'beforeArg') {
      if (ch === ')' && !sawComma) {
        cursor.pos++;
        state = 'closed';
      } else if (isQuote(ch)) {
        const close = text.indexOf(ch, cursor.pos + 1);
        if (close === -1) {
          return err(createMalformedCallError(text, 'unterminated string literal'));
        }
        args.push({ kind: 'literal', value: text.slice(cursor.pos + 1, close) });
        cursor.pos = close + 1;
        state = 'afterArg';
      } else if (isIdentStart(ch)) {
        args.push({ kind: 'param', name: cursor.readIdentifier() });
        state = 'afterArg';
      } else {
        return err(createMalformedCallError(text, `unexpected character '${ch}' in argument list`));
      }
    } else if (ch === ',') {
      cursor.pos++;
      sawComma = true;
      state = 'beforeArg';
    } else if (ch === ')') {
      cursor.pos++;
      state = 'closed';
    } else {
      return err(createMalformedCallError(text, `expected ',' or ')' but found '${ch}'`));
    }
  }

  return ok(args);
};

// ─────────────────────────────────────────────────────────────────────────────
// Parser
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses an expression as an embedded call for `marker`.
 *
 * Returns `ok(null)` when the expression does not start with `marker.embed`
 * (or `marker.dispatch`), so that text under another marker is left to the
 * native engine. Anything that does start that way must parse completely.
 */
export const parseEmbeddedCall = (
  text: string,
  marker: string
): Result<EmbeddedCall | null, MalformedCallError> => {
  const cursor = new Cursor(text);
  const method = readCallHead(cursor, marker);
  if (method === null) return ok(null);

  const argsResult = readArgList(cursor, text);
  if (argsResult.isErr()) return err(argsResult.error);

  cursor.skipWhitespace();
  if (!cursor.done) {
    return err(createMalformedCallError(text, 'unexpected text after closing parenthesis'));
  }

  const args = argsResult.value;
  const target = args[0];
  if (target === undefined) {
    return err(createMalformedCallError(text, 'missing run mode name'));
  }
  if (target.kind === 'literal' && !isValidIdentifier(target.value)) {
    return err(createMalformedCallError(text, `invalid run mode name "${target.value}"`));
  }

  return ok({ marker, method, args });
};
