/**
 * ErrorInfo construction - every failure leaves the bridge in this shape
 */

import {
  ForthicError,
  ModuleError,
  ModuleImportError,
  ModuleLoadError,
  NativeWordError,
  errorMessage,
  rootCause,
} from '../core/errors';
import type { CodeLocation } from '../core/reader/tokenize';
import type { ErrorInfo } from './runtimeService';

export const RUNTIME_NAME = 'typescript';

export function formatLocation(location: CodeLocation): string {
  return `${location.source ?? '<input>'}:${location.line}:${location.column}`;
}

function moduleNameOf(error: unknown): string | undefined {
  if (
    error instanceof NativeWordError ||
    error instanceof ModuleImportError ||
    error instanceof ModuleError ||
    error instanceof ModuleLoadError
  ) {
    return error.moduleName || undefined;
  }
  return undefined;
}

function stackTraceOf(error: unknown): string[] {
  if (!(error instanceof Error) || !error.stack) return [];
  return error.stack
    .split('\n')
    .slice(1)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Convert any thrown value into an ErrorInfo. `context` is merged over the
 * keys derived from the error itself.
 */
export function buildErrorInfo(error: unknown, context: Record<string, string> = {}): ErrorInfo {
  const info: ErrorInfo = {
    message: errorMessage(error),
    runtime: RUNTIME_NAME,
    stack_trace: stackTraceOf(error),
    error_type: error instanceof Error ? error.name : 'Error',
    context: {},
  };

  if (error instanceof ForthicError && error.location) {
    info.word_location = formatLocation(error.location);
  }

  const moduleName = moduleNameOf(error);
  if (moduleName) info.module_name = moduleName;

  const root = rootCause(error);
  if (root !== error) {
    info.context.root_error_type = root instanceof Error ? root.name : typeof root;
    info.context.root_message = errorMessage(root);
  }

  Object.assign(info.context, context);
  return info;
}
