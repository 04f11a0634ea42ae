/**
 * Remote Runtime Client
 *
 * Calls another Forthic runtime's bridge over HTTP (POST /rpc/<Method>).
 */

import { WireFormatError, errorMessage } from '../core/errors';
import type { Val } from '../core/eval/values';
import type { GetModuleInfoResponse, RuntimeMethod, WireModuleSummary, WordInfo } from '../server/runtimeService';
import { decodeStack, encodeStack } from '../server/serializer';
import { RemoteExecutionError, RemoteRuntimeError, parseErrorInfo } from './errors';

export interface RemoteRuntimeClientOptions {
  /** Per-call deadline; 0 disables it */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/** `host:port` becomes `http://host:port`; a trailing slash is dropped. */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, '');
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export class RemoteRuntimeClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private closed = false;

  constructor(readonly address: string, options: RemoteRuntimeClientOptions = {}) {
    this.baseUrl = normalizeAddress(address);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }

  // ─────────────────────────────────────────────────────────────
  // RPC
  // ─────────────────────────────────────────────────────────────

  /** Run one word remotely against `stack`; resolves with the resulting stack. */
  async executeWord(wordName: string, stack: Val[]): Promise<Val[]> {
    const reply = await this.call('ExecuteWord', { word_name: wordName, stack: encodeStack(stack) });
    return this.resultStack(reply);
  }

  async executeSequence(wordNames: string[], stack: Val[]): Promise<Val[]> {
    const reply = await this.call('ExecuteSequence', { word_names: wordNames, stack: encodeStack(stack) });
    return this.resultStack(reply);
  }

  async listModules(): Promise<WireModuleSummary[]> {
    const reply = await this.call('ListModules', {});
    const modules = Array.isArray(reply.modules) ? reply.modules : [];
    return modules.filter(isObject).map(m => ({
      name: asString(m.name),
      description: asString(m.description),
      word_count: typeof m.word_count === 'number' ? m.word_count : 0,
      runtime_specific: m.runtime_specific === true,
    }));
  }

  async getModuleInfo(moduleName: string): Promise<GetModuleInfoResponse> {
    const reply = await this.call('GetModuleInfo', { module_name: moduleName });
    const words: WordInfo[] = (Array.isArray(reply.words) ? reply.words : []).filter(isObject).map(w => ({
      name: asString(w.name),
      stack_effect: asString(w.stack_effect),
      description: asString(w.description),
    }));
    return { name: asString(reply.name), description: asString(reply.description), words };
  }

  // ─────────────────────────────────────────────────────────────
  // TRANSPORT
  // ─────────────────────────────────────────────────────────────

  private resultStack(reply: JsonObject): Val[] {
    try {
      return decodeStack(reply.result_stack ?? [], 'result_stack');
    } catch (e) {
      if (e instanceof WireFormatError) {
        throw new RemoteRuntimeError(this.address, `malformed result stack: ${e.message}`, e);
      }
      throw e;
    }
  }

  /**
   * POST one request. A reply carrying `error` becomes RemoteExecutionError;
   * anything that is not a protocol reply becomes RemoteRuntimeError.
   */
  private async call(method: RuntimeMethod, request: JsonObject): Promise<JsonObject> {
    if (this.closed) {
      throw new RemoteRuntimeError(this.address, 'client is closed');
    }

    const controller = new AbortController();
    const timeoutId = this.timeoutMs > 0 ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/rpc/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: controller.signal,
      });
      body = await response.json();
    } catch (e) {
      if (e instanceof Error && e.name === 'AbortError') {
        throw new RemoteRuntimeError(this.address, `${method} timed out after ${this.timeoutMs}ms`, e);
      }
      throw new RemoteRuntimeError(this.address, `${method} failed: ${errorMessage(e)}`, e);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!isObject(body)) {
      throw new RemoteRuntimeError(this.address, `${method} returned a non-object reply (HTTP ${response.status})`);
    }
    if (body.error !== undefined && body.error !== null) {
      throw new RemoteExecutionError(parseErrorInfo(body.error));
    }
    if (!response.ok) {
      throw new RemoteRuntimeError(this.address, `${method} failed with HTTP ${response.status}`);
    }
    return body;
  }
}
