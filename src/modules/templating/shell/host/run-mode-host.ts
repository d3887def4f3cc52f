/**
 * Run Mode Host
 *
 * In-memory embedding host: a dispatch table of run modes plus the
 * `template_pre_process` / `template_post_process` callback lists.
 */

import type {
  EmbeddingHost,
  PostProcessHook,
  PreProcessHook,
  RunModeHandler,
  Template,
} from '../../core/ports.js';
import type { OutputRef, TemplateHookName } from '../../core/types.js';

export interface RunModeHost extends EmbeddingHost {
  addRunModes(runModes: Readonly<Record<string, RunModeHandler>>): void;
  /** Called with each template before it renders; may change its params */
  addPreProcessHook(callback: PreProcessHook): void;
  /** Called with each template and its output after it renders; may change the output */
  addPostProcessHook(callback: PostProcessHook): void;
  runModeNames(): string[];
}

export interface RunModeHostOptions {
  runModes?: Readonly<Record<string, RunModeHandler>>;
}

export const makeRunModeHost = (options: RunModeHostOptions = {}): RunModeHost => {
  const runModes = new Map<string, RunModeHandler>(Object.entries(options.runModes ?? {}));
  const preProcess: PreProcessHook[] = [];
  const postProcess: PostProcessHook[] = [];

  return {
    resolveRunMode(name) {
      return runModes.get(name);
    },

    addRunModes(additional) {
      for (const [name, handler] of Object.entries(additional)) {
        runModes.set(name, handler);
      }
    },

    addPreProcessHook(callback) {
      preProcess.push(callback);
    },

    addPostProcessHook(callback) {
      postProcess.push(callback);
    },

    callHook(name: TemplateHookName, template: Template, output?: OutputRef) {
      if (name === 'template_pre_process') {
        for (const hook of preProcess) hook(template);
      } else if (output !== undefined) {
        for (const hook of postProcess) hook(template, output);
      }
    },

    runModeNames() {
      return [...runModes.keys()];
    },
  };
};
