/**
 * RemoteModule - proxies one module of a remote runtime
 *
 * Usage:
 *   const module = new RemoteModule('math', client, 'reports');
 *   await module.discover();
 *   await interp.importModule(module);
 */

import { Module } from '../core/modules/module';
import { createLogger } from '../core/log';
import type { GetModuleInfoResponse } from '../server/runtimeService';
import type { RemoteRuntimeClient } from './client';
import { RemoteWord } from './remoteWord';

const log = createLogger('remote-module');

export class RemoteModule extends Module {
  private info?: GetModuleInfoResponse;

  constructor(
    name: string,
    private readonly client: RemoteRuntimeClient,
    readonly runtimeName = 'remote'
  ) {
    super(name);
  }

  get discovered(): boolean {
    return this.info !== undefined;
  }

  getModuleInfo(): GetModuleInfoResponse | undefined {
    return this.info;
  }

  /** Fetch the module's word list once and add an exported RemoteWord per word. */
  async discover(): Promise<void> {
    if (this.info) return;
    const info = await this.client.getModuleInfo(this.name);
    for (const word of info.words) {
      this.addExportableWord(
        new RemoteWord(word.name, this.client, this.runtimeName, this.name, word.stack_effect, word.description)
      );
    }
    this.description = info.description;
    this.info = info;
    log.debug(`Discovered ${info.words.length} word(s) in ${this.runtimeName}:${this.name}`);
  }
}
