/**
 * remote_runtime - Forthic words for connecting to other runtimes and
 * importing their modules.
 *
 *   "reports" "localhost:50051" CONNECT-RUNTIME
 *   ["math"] "reports" USE-REMOTE-MODULES
 *   ["math" "text"] "reports" "rep" USE-REMOTE-MODULES-AS
 *   3 4 rep.PLUS
 */

import type { Interpreter } from '../core/eval/interpreter';
import { VArray, VStr, type Val } from '../core/eval/values';
import { defineModule } from '../core/modules/binding';
import type { Module } from '../core/modules/module';
import { RemoteModule } from './remoteModule';
import { RuntimeManager } from './runtimeManager';

export const REMOTE_RUNTIME_MODULE_NAME = 'remote_runtime';

function expectString(value: Val, what: string): string {
  if (value.tag !== 'Str') {
    throw new TypeError(`${what} must be a string (got ${value.tag})`);
  }
  return value.s;
}

function expectNames(value: Val): string[] {
  if (value.tag === 'Str') return [value.s];
  if (value.tag !== 'Array') {
    throw new TypeError(`Module names must be an array (got ${value.tag})`);
  }
  return value.items.map(item => expectString(item, 'Module name'));
}

async function useRemoteModules(
  manager: RuntimeManager,
  interp: Interpreter,
  names: string[],
  runtime: string,
  prefix: string
): Promise<void> {
  const client = manager.getRuntime(runtime);
  if (!client) {
    throw new Error(`Runtime '${runtime}' not connected. Use CONNECT-RUNTIME first.`);
  }
  for (const name of names) {
    const module = new RemoteModule(name, client, runtime);
    await module.discover();
    await interp.importModule(module, prefix);
  }
}

/**
 * Connections made by these words live in `manager` when one is given.
 * Otherwise each interpreter gets its own manager, so interpreters sharing
 * this module (one per server request) never see each other's connections.
 */
export function createRemoteRuntimeModule(manager?: RuntimeManager): Module {
  const managers = new WeakMap<Interpreter, RuntimeManager>();
  const managerFor = (interp: Interpreter): RuntimeManager => {
    if (manager) return manager;
    let own = managers.get(interp);
    if (!own) {
      own = new RuntimeManager();
      managers.set(interp, own);
    }
    return own;
  };

  return defineModule({
    name: REMOTE_RUNTIME_MODULE_NAME,
    description: 'Connect to remote Forthic runtimes and import their modules',
    words: [
      {
        name: 'CONNECT-RUNTIME',
        stackEffect: '( name:string address:string -- )',
        description: 'Connects to a remote runtime under a name',
        impl: ([name, address], _options, interp) => {
          managerFor(interp).connectRuntime(expectString(name, 'Runtime name'), expectString(address, 'Runtime address'));
        },
      },
      {
        name: 'DISCONNECT-RUNTIME',
        stackEffect: '( name:string -- )',
        description: 'Closes a named runtime connection',
        impl: ([name], _options, interp) => {
          managerFor(interp).disconnectRuntime(expectString(name, 'Runtime name'));
        },
      },
      {
        name: 'LIST-RUNTIMES',
        stackEffect: '( -- runtimes:string[] )',
        description: 'Names of the connected runtimes',
        impl: (_args, _options, interp) => VArray(managerFor(interp).listConnections().map(VStr)),
      },
      {
        name: 'USE-REMOTE-MODULES',
        stackEffect: '( modules:string[] runtime:string -- )',
        description: 'Imports modules from a connected runtime',
        impl: async ([modules, runtime], _options, interp) => {
          await useRemoteModules(managerFor(interp), interp, expectNames(modules), expectString(runtime, 'Runtime name'), '');
        },
      },
      {
        name: 'USE-REMOTE-MODULES-AS',
        stackEffect: '( modules:string[] runtime:string prefix:string -- )',
        description: 'Imports modules from a connected runtime under prefix.WORD names',
        impl: async ([modules, runtime, prefix], _options, interp) => {
          await useRemoteModules(
            managerFor(interp),
            interp,
            expectNames(modules),
            expectString(runtime, 'Runtime name'),
            expectString(prefix, 'Prefix')
          );
        },
      },
    ],
  });
}
