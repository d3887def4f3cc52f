/**
 * Unit tests for pre-scan emulation
 */

import { describe, expect, it } from 'vitest';

import { findHandlebarsExpressions } from '@/modules/templating/shell/drivers/handlebars.js';
import { findMustacheExpressions } from '@/modules/templating/shell/drivers/mustache.js';
import { runPrescan } from '@/modules/templating/shell/drivers/pre-scan.js';

import { makeFakeComponentHandler, makeFakeContainingTemplate } from '../../fixtures/fakes.js';

const scan = (source: string, params: Record<string, unknown> = {}) => {
  const handler = makeFakeComponentHandler({ header: 'HI', footer: 'BYE' });
  const result = runPrescan({
    source,
    sites: findHandlebarsExpressions(source),
    marker: 'cgiapp',
    params,
    handler,
    containingTemplate: makeFakeContainingTemplate(params),
  });
  return { handler, result };
};

describe('findHandlebarsExpressions', () => {
  it('locates the expression inside double and triple mustaches', () => {
    const source = "A{{cgiapp.embed('x')}}B{{{ name }}}";

    const sites = findHandlebarsExpressions(source);

    expect(sites.map((site) => source.slice(site.start, site.end))).toEqual([
      "cgiapp.embed('x')",
      'name',
    ]);
  });

  it('handles whitespace control markers', () => {
    const source = "{{~ cgiapp.embed('x') ~}}";

    const [site] = findHandlebarsExpressions(source);

    expect(site).toEqual({ start: 4, end: 21 });
  });

  it('skips backslash-escaped mustaches', () => {
    const source = "\\{{cgiapp.embed('x')}}\\\\{{ name }}";

    const sites = findHandlebarsExpressions(source);

    expect(sites.map((site) => source.slice(site.start, site.end))).toEqual(['name']);
  });
});

describe('findMustacheExpressions', () => {
  it('returns variable tags, including those inside sections', () => {
    const source = "{{title}}{{#show}}{{{cgiapp.embed('x')}}}{{/show}}{{! note }}";

    const sites = findMustacheExpressions(source)._unsafeUnwrap();

    expect(sites.map((site) => source.slice(site.start, site.end))).toEqual([
      'title',
      "cgiapp.embed('x')",
    ]);
  });

  it('reports parse failures as render errors', () => {
    const error = findMustacheExpressions('{{#open}}')._unsafeUnwrapErr();

    expect(error.type).toBe('RenderError');
    expect(error.backend).toBe('mustache');
  });
});

describe('runPrescan', () => {
  it('replaces each call with a synthesized param holding its output', () => {
    const { result } = scan("A{{cgiapp.embed('header')}}B{{name}}C{{{cgiapp.embed('footer')}}}");

    expect(result._unsafeUnwrap()).toEqual({
      source: 'A{{__cgiapp_embed_0}}B{{name}}C{{{__cgiapp_embed_1}}}',
      injected: { __cgiapp_embed_0: 'HI', __cgiapp_embed_1: 'BYE' },
    });
  });

  it('writes references through the given formatter', () => {
    const source = "{{cgiapp.embed('header')}}";
    const result = runPrescan({
      source,
      sites: findHandlebarsExpressions(source),
      marker: 'cgiapp',
      params: {},
      handler: makeFakeComponentHandler({ header: 'HI' }),
      containingTemplate: makeFakeContainingTemplate({}),
      formatReference: (key) => `@root.${key}`,
    });

    expect(result._unsafeUnwrap()).toEqual({
      source: '{{@root.__cgiapp_embed_0}}',
      injected: { __cgiapp_embed_0: 'HI' },
    });
  });

  it('runs calls in document order', () => {
    const { handler } = scan("{{cgiapp.embed('footer')}}{{cgiapp.embed('header')}}");

    expect(handler.calls.map((call) => call.runMode)).toEqual(['footer', 'header']);
  });

  it('skips synthesized names that are already params', () => {
    const { result } = scan("{{cgiapp.embed('header')}}", { __cgiapp_embed_0: 'taken' });

    expect(result._unsafeUnwrap()).toEqual({
      source: '{{__cgiapp_embed_1}}',
      injected: { __cgiapp_embed_1: 'HI' },
    });
  });

  it('leaves expressions under other markers alone', () => {
    const { result, handler } = scan("{{other.embed('header')}}");

    expect(result._unsafeUnwrap()).toEqual({
      source: "{{other.embed('header')}}",
      injected: {},
    });
    expect(handler.calls).toHaveLength(0);
  });

  it('stops at the first failing call', () => {
    const { result, handler } = scan(
      "{{cgiapp.embed('missing')}}{{cgiapp.embed('header')}}"
    );

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'UnknownHandlerError',
      runMode: 'missing',
    });
    expect(handler.calls).toHaveLength(1);
  });

  it('reports malformed calls', () => {
    const { result } = scan("{{cgiapp.embed('header'}}");

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'MalformedCallError',
      text: "cgiapp.embed('header'",
    });
  });
});
