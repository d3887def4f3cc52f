/**
 * Output Template Use Case
 *
 * Renders a loaded template the way callers see it:
 * 1. Merge any params given with the call
 * 2. Run the host's `template_pre_process` hooks (they may change params)
 * 3. Render through the driver
 * 4. Run `template_post_process` hooks with a mutable output holder
 * 5. Return the text, or the holder itself when references were requested
 */

import { err, ok, type Result } from 'neverthrow';

import type { TemplateError } from '../errors.js';
import type { EmbeddingHost, Template, TemplateDriver } from '../ports.js';
import type { OutputRef, ParamMap, RenderedOutput } from '../types.js';

export interface OutputTemplateDeps {
  driver: TemplateDriver;
  /** Returns the host, or undefined once it has been released */
  getHost: () => EmbeddingHost | undefined;
  returnReferences: boolean;
}

export const outputTemplate = (
  deps: OutputTemplateDeps,
  template: Template,
  params?: ParamMap
): Result<RenderedOutput, TemplateError> => {
  const { driver, getHost, returnReferences } = deps;

  if (params !== undefined) {
    driver.setParameters(params);
  }

  getHost()?.callHook('template_pre_process', template);

  const rendered = driver.render();
  if (rendered.isErr()) {
    return err(rendered.error);
  }

  const output: OutputRef = { content: rendered.value };
  getHost()?.callHook('template_post_process', template, output);

  return ok(returnReferences ? output : output.content);
};
