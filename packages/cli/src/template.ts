import { build, formatMessages, type Message } from 'esbuild';
import { createRequire } from 'node:module';
import { runInThisContext } from 'node:vm';
import React from 'react';
import * as jsxRuntime from 'react/jsx-runtime';
import * as core from '@pagewright/core';
import * as components from '@pagewright/react';

/**
 * Modules a template shares with the CLI. Element types are compared by
 * identity during serialization, so a template must see the same component
 * functions the renderer checks against.
 */
const SHARED_MODULES = new Map<string, unknown>([
  ['react', React],
  ['react/jsx-runtime', jsxRuntime],
  ['@pagewright/core', core],
  ['@pagewright/react', components],
]);

function hasMessages(err: unknown): err is Error & { errors: Message[] } {
  return err instanceof Error && 'errors' in err && Array.isArray(err.errors);
}

/** Bundles a template and its relative imports into one CommonJS module. */
export async function compileTemplate(path: string): Promise<string> {
  try {
    const result = await build({
      entryPoints: [path],
      bundle: true,
      write: false,
      format: 'cjs',
      platform: 'node',
      target: 'node20',
      jsx: 'automatic',
      logLevel: 'silent',
      external: [...SHARED_MODULES.keys()],
    });
    const [output] = result.outputFiles;
    if (!output) throw new Error(`esbuild produced no output for ${path}`);
    return output.text;
  } catch (err) {
    if (!hasMessages(err)) throw err;
    const messages = await formatMessages(err.errors, { kind: 'error', color: false });
    throw new Error(`Could not compile ${path}:\n\n${messages.join('\n')}`, { cause: err });
  }
}

/**
 * Evaluates compiled template code and returns its exports. Shared modules
 * come from the CLI; anything else resolves from the template's directory.
 */
export function evaluateTemplate(code: string, path: string): Record<string, unknown> {
  const requireFromTemplate = createRequire(path);
  const resolveModule = (id: string): unknown =>
    SHARED_MODULES.has(id) ? SHARED_MODULES.get(id) : requireFromTemplate(id);

  const factory: unknown = runInThisContext(`(function (exports, require, module) {\n${code}\n})`, {
    filename: path,
  });
  if (typeof factory !== 'function') {
    throw new Error(`Compiled template ${path} did not evaluate to a module`);
  }

  const loaded: { exports: Record<string, unknown> } = { exports: {} };
  factory(loaded.exports, resolveModule, loaded);
  return loaded.exports;
}

/** Compiles and evaluates the template at `path`. */
export async function loadTemplateModule(path: string): Promise<Record<string, unknown>> {
  return evaluateTemplate(await compileTemplate(path), path);
}
