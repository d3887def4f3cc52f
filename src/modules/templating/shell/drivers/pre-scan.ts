/**
 * Pre-scan Emulation
 *
 * For engines that only substitute plain values. Before the native render,
 * every embedded call found in the source is run, its output is stored under
 * a synthesized parameter name, and the call expression in the source is
 * replaced by that name.
 *
 * Limitation: arguments resolve against the parameters present when the scan
 * starts. A parameter set while the scan runs (for example by a run mode's
 * side effect) is not seen by later calls in the same render and resolves to
 * an empty string.
 */

import { err, ok, type Result } from 'neverthrow';

import { invokeEmbeddedCall } from '../../core/component-handler.js';
import { parseEmbeddedCall } from '../../core/embed-syntax.js';

import type { TemplateError } from '../../core/errors.js';
import type { ComponentHandler, ContainingTemplate } from '../../core/ports.js';
import type { ParamMap } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A candidate expression in the source: the text inside a variable tag.
 */
export interface ExpressionSite {
  /** Offset of the expression in the source */
  start: number;
  /** Offset just past the expression */
  end: number;
}

export interface PrescanInput {
  source: string;
  sites: readonly ExpressionSite[];
  marker: string;
  /** Parameters as they were when the render started */
  params: Readonly<ParamMap>;
  handler: ComponentHandler;
  containingTemplate: ContainingTemplate;
  /** Writes the reference to a synthesized parameter into the source (default: the bare name) */
  formatReference?: (key: string) => string;
}

export interface PrescanOutput {
  /** Source with each call replaced by its synthesized parameter name */
  source: string;
  /** Synthesized parameter name → run mode output */
  injected: ParamMap;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const makeKeyFactory = (marker: string, params: Readonly<ParamMap>): (() => string) => {
  let counter = 0;
  return () => {
    let key = `__${marker}_embed_${String(counter++)}`;
    while (Object.prototype.hasOwnProperty.call(params, key)) {
      key = `__${marker}_embed_${String(counter++)}`;
    }
    return key;
  };
};

/**
 * Runs every embedded call among `sites` in document order.
 * The first failing call aborts the scan; no partial source is returned.
 */
export const runPrescan = (input: PrescanInput): Result<PrescanOutput, TemplateError> => {
  const { source, marker, params, handler, containingTemplate, formatReference = (key) => key } =
    input;
  const sites = [...input.sites].sort((a, b) => a.start - b.start);
  const nextKey = makeKeyFactory(marker, params);

  const injected: ParamMap = {};
  const pieces: string[] = [];
  let cursor = 0;

  for (const site of sites) {
    const expression = source.slice(site.start, site.end);
    const parsed = parseEmbeddedCall(expression, marker);
    if (parsed.isErr()) return err(parsed.error);
    if (parsed.value === null) continue;

    const output = invokeEmbeddedCall(handler, parsed.value, params, containingTemplate);
    if (output.isErr()) return err(output.error);

    const key = nextKey();
    injected[key] = output.value;
    pieces.push(source.slice(cursor, site.start), formatReference(key));
    cursor = site.end;
  }

  pieces.push(source.slice(cursor));
  return ok({ source: pieces.join(''), injected });
};
