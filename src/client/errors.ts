/**
 * Errors raised on the calling side of the remote bridge
 */

import { ForthicError } from '../core/errors';
import type { ErrorInfo } from '../server/runtimeService';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

/**
 * The remote runtime ran the request and reported a failure. Carries the
 * remote ErrorInfo unchanged.
 */
export class RemoteExecutionError extends ForthicError {
  constructor(public readonly info: ErrorInfo) {
    super('', describeRemoteError(info));
    this.name = 'RemoteExecutionError';
  }

  get runtime(): string {
    return this.info.runtime;
  }

  /** Error class name on the remote side */
  get errorType(): string {
    return this.info.error_type;
  }

  get remoteStackTrace(): string[] {
    return this.info.stack_trace;
  }

  /** Local stack followed by the remote one. */
  getFullStackTrace(): string {
    let result = `${this.name}: ${this.message}\n\nLocal stack:\n${this.stack ?? ''}`;
    if (this.info.stack_trace.length > 0) {
      result += `\n\nRemote stack (${this.info.runtime}):\n${this.info.stack_trace.join('\n')}`;
    }
    return result;
  }

  getErrorReport(): string {
    const lines = [
      RULE,
      'REMOTE RUNTIME ERROR',
      RULE,
      '',
      `Runtime: ${this.info.runtime}`,
      `Error Type: ${this.info.error_type}`,
      `Message: ${this.info.message}`,
    ];
    if (this.info.module_name) lines.push(`Module: ${this.info.module_name}`);
    if (this.info.word_location) lines.push(`Location: ${this.info.word_location}`);
    const context = Object.entries(this.info.context);
    if (context.length > 0) {
      lines.push('', 'Context:', ...context.map(([key, value]) => `  ${key}: ${value}`));
    }
    lines.push('', THIN_RULE, 'Stack Trace:', THIN_RULE, ...this.info.stack_trace, RULE);
    return lines.join('\n');
  }
}

/** The remote runtime could not be reached or did not answer in protocol. */
export class RemoteRuntimeError extends ForthicError {
  constructor(public readonly address: string, note: string, cause?: unknown) {
    super('', `Remote runtime at ${address}: ${note}`, undefined, cause);
    this.name = 'RemoteRuntimeError';
  }
}

function describeRemoteError(info: ErrorInfo): string {
  let message = `Error in ${info.runtime} runtime: ${info.message}`;
  if (info.module_name) message += `\n  Module: ${info.module_name}`;
  if (info.word_location) message += `\n  Location: ${info.word_location}`;
  const context = Object.entries(info.context);
  if (context.length > 0) {
    message += '\n  Context:';
    for (const [key, value] of context) {
      message += `\n    ${key}: ${value}`;
    }
  }
  return message;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' && value !== '' ? value : fallback;
}

/** Read an ErrorInfo from a reply, filling in what the remote side left out. */
export function parseErrorInfo(raw: unknown): ErrorInfo {
  const obj = isObject(raw) ? raw : {};
  const info: ErrorInfo = {
    message: stringOr(obj.message, 'Unknown error'),
    runtime: stringOr(obj.runtime, 'unknown'),
    stack_trace: Array.isArray(obj.stack_trace) ? obj.stack_trace.filter((f): f is string => typeof f === 'string') : [],
    error_type: stringOr(obj.error_type, 'Error'),
    context: {},
  };
  if (typeof obj.word_location === 'string' && obj.word_location !== '') info.word_location = obj.word_location;
  if (typeof obj.module_name === 'string' && obj.module_name !== '') info.module_name = obj.module_name;
  if (isObject(obj.context)) {
    for (const [key, value] of Object.entries(obj.context)) {
      if (typeof value === 'string') info.context[key] = value;
    }
  }
  return info;
}
