/**
 * Unit tests for the Mustache driver (pre-scan strategy)
 */

import Mustache from 'mustache';
import { describe, expect, it } from 'vitest';

import { makeStandardRunModes, makeTemplatingHarness } from '../../fixtures/fakes.js';

describe('mustache driver', () => {
  describe('embedded calls', () => {
    it('substitutes a call with its run mode output', () => {
      const { load } = makeTemplatingHarness();

      const result = load('mustache', "Hello {{{cgiapp.embed('header')}}}!").output();

      expect(result._unsafeUnwrap()).toBe('Hello HI!');
    });

    it('passes param refs to the run mode', () => {
      const { load } = makeTemplatingHarness();
      const template = load('mustache', "{{& cgiapp.embed('greet', name)}}", { name: 'Ada' });

      expect(template.output()._unsafeUnwrap()).toBe('Hi, Ada');
    });

    it('lets Mustache escape output written in a double mustache', () => {
      const { load } = makeTemplatingHarness();

      const result = load('mustache', "{{cgiapp.embed('bold')}}").output();

      expect(result._unsafeUnwrap()).toBe('&lt;b&gt;x&lt;&#x2F;b&gt;');
    });

    it('finds calls inside sections', () => {
      const { load } = makeTemplatingHarness();
      const source = "{{#show}}[{{{cgiapp.embed('header')}}}]{{/show}}";

      expect(load('mustache', source, { show: true }).output()._unsafeUnwrap()).toBe('[HI]');
      expect(load('mustache', source, { show: false }).output()._unsafeUnwrap()).toBe('');
    });

    it('leaves calls under another marker to Mustache', () => {
      const { load } = makeTemplatingHarness();

      const result = load('mustache', "[{{other.embed('header')}}]").output();

      expect(result._unsafeUnwrap()).toBe('[]');
    });

    it('recognizes only the configured marker', () => {
      const { load } = makeTemplatingHarness(makeStandardRunModes(), {
        drivers: { mustache: { embedTagName: 'app' } },
      });

      const result = load('mustache', "{{{app.embed('header')}}}|{{{cgiapp.embed('header')}}}").output();

      expect(result._unsafeUnwrap()).toBe('HI|');
    });

    it('honours custom delimiters', () => {
      const { loader } = makeTemplatingHarness(makeStandardRunModes(), {
        drivers: { mustache: { tags: ['<%', '%>'] } },
      });

      const template = loader
        .load({ type: 'mustache', string: "Hello <%& cgiapp.embed('header') %>, <%name%>!" })
        ._unsafeUnwrap();

      expect(template.output({ name: 'Ada' })._unsafeUnwrap()).toBe('Hello HI, Ada!');
    });
  });

  describe('failures', () => {
    it('fails with UnknownHandlerError and no output for an unregistered run mode', () => {
      const { load } = makeTemplatingHarness();

      const error = load('mustache', "{{{cgiapp.embed('missing')}}}").output()._unsafeUnwrapErr();

      expect(error).toMatchObject({ type: 'UnknownHandlerError', runMode: 'missing' });
    });

    it('reports a malformed call', () => {
      const { load } = makeTemplatingHarness();

      const error = load('mustache', "{{{cgiapp.embed('header'}}}").output()._unsafeUnwrapErr();

      expect(error).toMatchObject({
        type: 'MalformedCallError',
        text: "cgiapp.embed('header'",
      });
    });

    it('wraps Mustache parse errors with the backend', () => {
      const { load } = makeTemplatingHarness();

      const error = load('mustache', '{{#open}} never closed').output()._unsafeUnwrapErr();

      expect(error).toMatchObject({ type: 'RenderError', backend: 'mustache' });
    });
  });

  describe('parameters', () => {
    it('renders the same after clearParameters as a fresh template', () => {
      const { load } = makeTemplatingHarness();
      const source = "[{{name}}]{{{cgiapp.embed('greet', name)}}}";
      const template = load('mustache', source, { name: 'Ada' });

      expect(template.output()._unsafeUnwrap()).toBe('[Ada]Hi, Ada');

      template.clearParameters();
      template.clearParameters();

      expect(template.output()._unsafeUnwrap()).toBe('[]Hi, ');
      expect(load('mustache', source).output()._unsafeUnwrap()).toBe('[]Hi, ');
    });

    it('does not see params set by a run mode during the same render', () => {
      const harness = makeTemplatingHarness();
      const template = harness.load(
        'mustache',
        "{{{cgiapp.embed('setter')}}}{{{cgiapp.embed('echo', late)}}}|{{late}}"
      );
      harness.host.addRunModes({
        setter: () => {
          template.setParameters({ late: 'L' });
          return 'set';
        },
      });

      expect(template.output()._unsafeUnwrap()).toBe('set<>|');
      expect(template.output()._unsafeUnwrap()).toBe('set<L>|L');
    });
  });

  describe('loading', () => {
    it('loads a template file from the include paths, adding the extension', () => {
      const { loader } = makeTemplatingHarness();

      const template = loader
        .load({ type: 'mustache', file: 'page', params: { title: 'Home' } })
        ._unsafeUnwrap();

      expect(template.filename).toBe('page.mustache');
      expect(template.output()._unsafeUnwrap()).toBe('<h1>Home</h1>HI');
    });

    it('exposes the Mustache module as its native object', () => {
      const { load } = makeTemplatingHarness();

      expect(load('mustache', 'x').object()).toBe(Mustache);
    });
  });
});
