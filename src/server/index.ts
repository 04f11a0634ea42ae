/**
 * @package Forthic Runtime Server
 *
 * Public API for serving this runtime's modules to other Forthic runtimes.
 *
 * TYPES (for consumers):
 *   - IRuntimeService       - The service interface contract
 *   - WireValue             - One stack value on the wire
 *   - ErrorInfo             - Failure report carried across the bridge
 *   - request and response messages for the four RPC methods
 *
 * IMPLEMENTATION (for running the server):
 *   - ForthicRuntime        - IRuntimeService over a frozen module registry
 *   - RuntimeServer         - The HTTP/WebSocket transport
 *   - startRuntimeServer()  - Load configured modules and listen
 */

// ============================================================
// PUBLIC TYPE EXPORTS - The Contract
// ============================================================

export type {
  IRuntimeService,
  RuntimeMethod,
  RpcCall,
  RpcReply,
  WireValue,
  WireField,
  WireFloat,
  ErrorInfo,
  ExecuteWordRequest,
  ExecuteWordResponse,
  ExecuteSequenceRequest,
  ExecuteSequenceResponse,
  ListModulesRequest,
  ListModulesResponse,
  WireModuleSummary,
  GetModuleInfoRequest,
  GetModuleInfoResponse,
  WordInfo,
} from './runtimeService';

// ============================================================
// PUBLIC CLASS EXPORTS - The Implementation
// ============================================================

export { RUNTIME_METHODS, isRuntimeMethod } from './runtimeService';
export { ForthicRuntime, type RuntimeOptions } from './runtime';
export { RuntimeServer } from './runtimeServer';
export { encodeValue, decodeValue, encodeStack, decodeStack } from './serializer';
export { buildErrorInfo, RUNTIME_NAME } from './errorInfo';
export { defaultModuleFactories, REMOTE_RUNTIME_IMPORT_PATH } from './factories';

// ============================================================
// CONVENIENCE FUNCTIONS
// ============================================================

import { DEFAULT_CONFIG, type ForthicConfig } from '../core/config/config';
import { setLogLevel } from '../core/log';
import { loadModules, type ModuleFactoryRegistry } from '../core/modules/loader';
import type { Module } from '../core/modules/module';
import { ForthicRuntime } from './runtime';
import { RuntimeServer } from './runtimeServer';
import { defaultModuleFactories } from './factories';

export interface StartOptions {
  config?: ForthicConfig;
  /** Factories for the config's module entries (default: defaultModuleFactories()) */
  factories?: ModuleFactoryRegistry;
  /** Modules registered in addition to the configured ones */
  modules?: Module[];
}

export interface RunningServer {
  runtime: ForthicRuntime;
  server: RuntimeServer;
  port: number;
}

/**
 * Load the configured modules, freeze them into a runtime and listen.
 * A required module that fails to load rejects with ModuleLoadError
 * before anything listens.
 *
 * @example
 * ```typescript
 * import { startRuntimeServer } from 'forthic-runtime/server';
 *
 * const { server, port } = await startRuntimeServer();
 * // POST http://localhost:50051/rpc/ListModules
 * // WebSocket at ws://localhost:50051/ws
 * ```
 */
export async function startRuntimeServer(options: StartOptions = {}): Promise<RunningServer> {
  const config = options.config ?? DEFAULT_CONFIG;
  if (options.config) setLogLevel(config.logLevel);

  const loaded = await loadModules(config.modules, options.factories ?? defaultModuleFactories());
  const runtime = await ForthicRuntime.create([...loaded, ...(options.modules ?? [])], {
    timezone: config.interpreter.timezone,
    maxAttempts: config.interpreter.maxAttempts,
  });

  const server = new RuntimeServer(runtime, config.server);
  const port = await server.start();
  return { runtime, server, port };
}
