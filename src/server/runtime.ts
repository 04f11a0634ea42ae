/**
 * Forthic Runtime - IRuntimeService over a frozen module registry
 *
 * Each call gets its own StandardInterpreter, seeded from the request's
 * stack, with every registered module imported into its app module.
 * Modules are shared between calls and must not be registered into after
 * startup.
 */

import { StandardInterpreter } from '../core/eval/standard';
import { ModuleImportError } from '../core/errors';
import { createLogger } from '../core/log';
import { CORE_MODULE_NAME, createCoreModule } from '../core/modules/core';
import type { Module } from '../core/modules/module';
import { ModuleRegistry } from '../registry/registry';
import { buildErrorInfo } from './errorInfo';
import type {
  ExecuteSequenceRequest,
  ExecuteSequenceResponse,
  ExecuteWordRequest,
  ExecuteWordResponse,
  GetModuleInfoRequest,
  GetModuleInfoResponse,
  IRuntimeService,
  ListModulesResponse,
} from './runtimeService';
import { decodeStack, encodeStack } from './serializer';

const log = createLogger('runtime');

export interface RuntimeOptions {
  timezone?: string;
  maxAttempts?: number;
}

export class ForthicRuntime implements IRuntimeService {
  private constructor(
    readonly registry: ModuleRegistry,
    private readonly options: RuntimeOptions
  ) {}

  /**
   * Register `core` plus `modules`, run each module's Forthic source once,
   * then freeze the registry.
   */
  static async create(modules: Module[], options: RuntimeOptions = {}): Promise<ForthicRuntime> {
    const registry = new ModuleRegistry();
    if (!modules.some(m => m.name === CORE_MODULE_NAME)) {
      registry.register(createCoreModule());
    }
    for (const module of modules) {
      registry.register(module);
    }

    const loader = new StandardInterpreter({ registry, timezone: options.timezone });
    for (const module of registry.list()) {
      await loader.initializeModule(module);
    }

    const validation = registry.validate();
    for (const problem of validation.errors) {
      log.warn(problem);
    }

    registry.freeze();
    log.info(`Runtime ready with ${registry.names().length} module(s): ${registry.names().join(', ')}`);
    return new ForthicRuntime(registry, options);
  }

  /** Fresh interpreter for one request. */
  createInterpreter(): StandardInterpreter {
    return new StandardInterpreter({
      registry: this.registry,
      timezone: this.options.timezone,
      maxAttempts: this.options.maxAttempts,
      modules: this.registry.list().filter(m => m.name !== CORE_MODULE_NAME),
    });
  }

  // ─────────────────────────────────────────────────────────────
  // EXECUTION
  // ─────────────────────────────────────────────────────────────

  async executeWord(request: ExecuteWordRequest): Promise<ExecuteWordResponse> {
    log.debug(`ExecuteWord ${request.word_name} (stack depth ${request.stack.length})`);
    try {
      const interp = this.createInterpreter();
      interp.setStack(decodeStack(request.stack));
      await interp.executeWord(request.word_name);
      return { result_stack: encodeStack(interp.getStack()) };
    } catch (e) {
      log.debug(`ExecuteWord ${request.word_name} failed: ${e instanceof Error ? e.name : 'Error'}`);
      return {
        result_stack: [],
        error: buildErrorInfo(e, { word_name: request.word_name }),
      };
    }
  }

  /** Fail-fast: the first failing word ends the sequence. */
  async executeSequence(request: ExecuteSequenceRequest): Promise<ExecuteSequenceResponse> {
    log.debug(`ExecuteSequence [${request.word_names.join(' ')}]`);
    const context: Record<string, string> = { word_sequence: request.word_names.join(' ') };

    let interp: StandardInterpreter;
    try {
      interp = this.createInterpreter();
      interp.setStack(decodeStack(request.stack));
    } catch (e) {
      return { result_stack: [], error: buildErrorInfo(e, context) };
    }

    for (let i = 0; i < request.word_names.length; i++) {
      const name = request.word_names[i];
      try {
        await interp.executeWord(name);
      } catch (e) {
        return {
          result_stack: [],
          error: buildErrorInfo(e, { ...context, failed_word: name, failed_index: String(i) }),
        };
      }
    }

    try {
      return { result_stack: encodeStack(interp.getStack()) };
    } catch (e) {
      return { result_stack: [], error: buildErrorInfo(e, context) };
    }
  }

  // ─────────────────────────────────────────────────────────────
  // INTROSPECTION
  // ─────────────────────────────────────────────────────────────

  async listModules(): Promise<ListModulesResponse> {
    return {
      modules: this.registry.summaries().map(s => ({
        name: s.name,
        description: s.description,
        word_count: s.wordCount,
        runtime_specific: s.runtimeSpecific,
      })),
    };
  }

  async getModuleInfo(request: GetModuleInfoRequest): Promise<GetModuleInfoResponse> {
    const description = this.registry.describe(request.module_name);
    if (!description) {
      throw new ModuleImportError('', request.module_name);
    }
    return {
      name: description.name,
      description: description.description,
      words: description.words.map(w => ({
        name: w.name,
        stack_effect: w.stackEffect,
        description: w.description,
      })),
    };
  }
}
