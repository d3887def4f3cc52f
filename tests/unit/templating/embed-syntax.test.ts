/**
 * Unit tests for the embedded call parser
 */

import { describe, expect, it } from 'vitest';

import {
  isValidIdentifier,
  parseEmbeddedCall,
  validateEmbedTagName,
} from '@/modules/templating/core/embed-syntax.js';

describe('parseEmbeddedCall', () => {
  describe('recognized calls', () => {
    it('parses a call with a single literal', () => {
      const result = parseEmbeddedCall("cgiapp.embed('header')", 'cgiapp');

      expect(result._unsafeUnwrap()).toEqual({
        marker: 'cgiapp',
        method: 'embed',
        args: [{ kind: 'literal', value: 'header' }],
      });
    });

    it('accepts dispatch as an alias and double-quoted literals', () => {
      const result = parseEmbeddedCall('cgiapp.dispatch("greet", name)', 'cgiapp');

      expect(result._unsafeUnwrap()).toEqual({
        marker: 'cgiapp',
        method: 'dispatch',
        args: [
          { kind: 'literal', value: 'greet' },
          { kind: 'param', name: 'name' },
        ],
      });
    });

    it('skips whitespace between tokens', () => {
      const result = parseEmbeddedCall(" cgiapp . embed ( 'a' , b ) ", 'cgiapp');

      expect(result._unsafeUnwrap()?.args).toEqual([
        { kind: 'literal', value: 'a' },
        { kind: 'param', name: 'b' },
      ]);
    });

    it('keeps commas and parentheses inside literals', () => {
      const result = parseEmbeddedCall("cgiapp.embed('greet', 'a, b)')", 'cgiapp');

      expect(result._unsafeUnwrap()?.args[1]).toEqual({ kind: 'literal', value: 'a, b)' });
    });

    it('uses the configured marker', () => {
      const result = parseEmbeddedCall("app.embed('header')", 'app');

      expect(result._unsafeUnwrap()?.marker).toBe('app');
    });
  });

  describe('text that is not a call', () => {
    it.each([
      ["other.embed('header')", 'another marker'],
      ["CGIAPP.embed('header')", 'a marker differing in case'],
      ['cgiapp.title', 'a plain property'],
      ["cgiapp.embedded('header')", 'a longer method name'],
      ['title', 'a bare name'],
      ['#if show', 'a block helper'],
    ])('returns null for %s (%s)', (text) => {
      expect(parseEmbeddedCall(text, 'cgiapp')._unsafeUnwrap()).toBeNull();
    });
  });

  describe('malformed calls', () => {
    it.each([
      ['cgiapp.embed', "expected '(' after method name"],
      ["cgiapp.embed('x'", "missing ')'"],
      ["cgiapp.embed('x)", 'unterminated string literal'],
      ["cgiapp.embed('x',)", "unexpected character ')' in argument list"],
      ["cgiapp.embed('a' 'b')", "expected ',' or ')' but found '''"],
      ['cgiapp.embed(1)', "unexpected character '1' in argument list"],
      ['cgiapp.embed()', 'missing run mode name'],
      ["cgiapp.embed('x') extra", 'unexpected text after closing parenthesis'],
      ["cgiapp.embed('not valid')", 'invalid run mode name "not valid"'],
    ])('rejects %s', (text, reason) => {
      const error = parseEmbeddedCall(text, 'cgiapp')._unsafeUnwrapErr();

      expect(error).toEqual({
        type: 'MalformedCallError',
        message: `Malformed embedded call "${text}": ${reason}`,
        text,
      });
    });
  });
});

describe('validateEmbedTagName', () => {
  it('accepts identifiers', () => {
    expect(validateEmbedTagName('cgiapp')._unsafeUnwrap()).toBe('cgiapp');
    expect(validateEmbedTagName('_my_app2')._unsafeUnwrap()).toBe('_my_app2');
  });

  it.each(['2app', 'my-app', '', 'a.b'])('rejects %j', (name) => {
    const error = validateEmbedTagName(name)._unsafeUnwrapErr();

    expect(error.type).toBe('ConfigurationError');
    expect(error.field).toBe('embedTagName');
  });
});

describe('isValidIdentifier', () => {
  it('follows the identifier grammar', () => {
    expect(isValidIdentifier('header')).toBe(true);
    expect(isValidIdentifier('Header_2')).toBe(true);
    expect(isValidIdentifier('2header')).toBe(false);
    expect(isValidIdentifier('')).toBe(false);
  });
});
