/**
 * Parameter Resolver
 *
 * Turns embedded-call arguments into values. Literals are returned as written;
 * param refs are looked up in the containing template's parameters, and a
 * missing param resolves to an empty string.
 */

import type { CallArg, ParamMap } from './types.js';

/**
 * Values that stand for "not set" in a template.
 */
export const normalizeNativeArg = (value: unknown): unknown =>
  value === undefined || value === null ? '' : value;

export const resolveArg = (arg: CallArg, params: Readonly<ParamMap>): unknown => {
  if (arg.kind === 'literal') return arg.value;
  if (!Object.prototype.hasOwnProperty.call(params, arg.name)) return '';
  return normalizeNativeArg(params[arg.name]);
};

/**
 * Resolves an argument list left to right. Does not touch `params`.
 */
export const resolveArgs = (args: readonly CallArg[], params: Readonly<ParamMap>): unknown[] =>
  args.map((arg) => resolveArg(arg, params));
