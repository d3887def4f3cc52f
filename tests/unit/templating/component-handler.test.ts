/**
 * Unit tests for the component handler
 */

import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  invokeEmbeddedCall,
  makeComponentHandler,
} from '@/modules/templating/core/component-handler.js';
import { createUnknownHandlerError } from '@/modules/templating/core/errors.js';
import { makeRunModeHost } from '@/modules/templating/shell/host/run-mode-host.js';

import {
  makeFakeContainingTemplate,
  makeSilentLogger,
  unusedTemplateLoader,
} from '../../fixtures/fakes.js';

import type { RunModeContext, RunModeHandler } from '@/modules/templating/index.js';

const makeHandler = (runModes: Record<string, RunModeHandler>) => {
  const host = makeRunModeHost({ runModes });
  return makeComponentHandler({
    getHost: () => host,
    backend: 'handlebars',
    templates: unusedTemplateLoader,
    logger: makeSilentLogger(),
  });
};

describe('makeComponentHandler', () => {
  it('returns the run mode output as the substitution text', () => {
    const handler = makeHandler({ header: () => 'HI' });

    const result = handler.invoke('header', [], makeFakeContainingTemplate());

    expect(result._unsafeUnwrap()).toBe('HI');
  });

  it('passes the containing template, the loader and the arguments in order', () => {
    const seen: { context?: RunModeContext; args?: unknown[] } = {};
    const handler = makeHandler({
      greet: (context, ...args) => {
        seen.context = context;
        seen.args = args;
        return 'ok';
      },
    });
    const containing = makeFakeContainingTemplate({ name: 'Ada' });

    handler.invoke('greet', ['literal', 'Ada'], containing);

    expect(seen.args).toEqual(['literal', 'Ada']);
    expect(seen.context?.containingTemplate).toBe(containing);
    expect(seen.context?.containingTemplate?.param('name')).toBe('Ada');
    expect(seen.context?.templates).toBe(unusedTemplateLoader);
  });

  it('fails with UnknownHandlerError for an unregistered run mode', () => {
    const handler = makeHandler({});

    const error = handler.invoke('missing', [], undefined)._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'UnknownHandlerError',
      message: "Run mode 'missing' is not registered",
      runMode: 'missing',
    });
  });

  it('fails with UnknownHandlerError once the host is gone', () => {
    const handler = makeComponentHandler({
      getHost: () => undefined,
      backend: 'mustache',
      templates: unusedTemplateLoader,
      logger: makeSilentLogger(),
    });

    expect(handler.invoke('header', [], undefined)._unsafeUnwrapErr().type).toBe(
      'UnknownHandlerError'
    );
  });

  it('wraps a throwing run mode as a RenderError for the backend', () => {
    const failure = new Error('kaput');
    const handler = makeHandler({
      boom: () => {
        throw failure;
      },
    });

    const error = handler.invoke('boom', [], undefined)._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'RenderError',
      message: "[handlebars] run mode 'boom' failed: kaput",
      backend: 'handlebars',
      runMode: 'boom',
      cause: failure,
    });
  });

  it('accepts output holders and results', () => {
    const handler = makeHandler({
      ref: () => ({ content: 'from ref' }),
      nested: () => ok('from result'),
      nestedRef: () => ok({ content: 'from result ref' }),
      failing: () => err(createUnknownHandlerError('inner')),
    });

    expect(handler.invoke('ref', [], undefined)._unsafeUnwrap()).toBe('from ref');
    expect(handler.invoke('nested', [], undefined)._unsafeUnwrap()).toBe('from result');
    expect(handler.invoke('nestedRef', [], undefined)._unsafeUnwrap()).toBe('from result ref');
    expect(handler.invoke('failing', [], undefined)._unsafeUnwrapErr()).toMatchObject({
      type: 'UnknownHandlerError',
      runMode: 'inner',
    });
  });
});

describe('invokeEmbeddedCall', () => {
  const handler = makeHandler({
    header: () => 'HI',
    greet: (_context, name) => `Hi, ${String(name)}`,
  });

  it('resolves the arguments against the params before invoking', () => {
    const result = invokeEmbeddedCall(
      handler,
      {
        marker: 'cgiapp',
        method: 'embed',
        args: [
          { kind: 'literal', value: 'greet' },
          { kind: 'param', name: 'name' },
        ],
      },
      { name: 'Ada' },
      makeFakeContainingTemplate()
    );

    expect(result._unsafeUnwrap()).toBe('Hi, Ada');
  });

  it('takes the run mode name from a param ref', () => {
    const result = invokeEmbeddedCall(
      handler,
      { marker: 'cgiapp', method: 'embed', args: [{ kind: 'param', name: 'target' }] },
      { target: 'header' },
      makeFakeContainingTemplate()
    );

    expect(result._unsafeUnwrap()).toBe('HI');
  });

  it('rejects a run mode name that does not resolve to an identifier', () => {
    const error = invokeEmbeddedCall(
      handler,
      { marker: 'cgiapp', method: 'dispatch', args: [{ kind: 'param', name: 'target' }] },
      {},
      makeFakeContainingTemplate()
    )._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'MalformedCallError',
      message: 'Malformed embedded call "cgiapp.dispatch(...)": invalid run mode name ""',
      text: 'cgiapp.dispatch(...)',
    });
  });
});
