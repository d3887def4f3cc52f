/**
 * Run Mode REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Query string of a run-mode request. The run mode is read from one
 * configurable key; every value is passed on to the run mode.
 */
export const RunModeQuerySchema = Type.Record(Type.String(), Type.String());

export type RunModeQuery = Static<typeof RunModeQuerySchema>;

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
