/**
 * RemoteWord - a word whose body runs in another runtime
 *
 * The whole local stack is sent with the call and replaced by the stack the
 * remote side returns. On failure the local stack is left untouched.
 */

import type { Interpreter } from '../core/eval/interpreter';
import { Word } from '../core/modules/word';
import type { RemoteRuntimeClient } from './client';

export interface RuntimeInfo {
  runtime: string;
  isRemote: boolean;
  isStandard: boolean;
  availableIn: string[];
}

export class RemoteWord extends Word {
  constructor(
    name: string,
    private readonly client: RemoteRuntimeClient,
    readonly runtimeName: string,
    readonly moduleName: string,
    stackEffect = '( -- )',
    description = ''
  ) {
    super(name);
    this.stackEffect = stackEffect;
    this.description = description;
  }

  async execute(interp: Interpreter): Promise<void> {
    try {
      const result = await this.client.executeWord(this.name, interp.getStack());
      interp.setStack(result);
    } catch (e) {
      await this.handleFailure(e, interp);
    }
  }

  getRuntimeInfo(): RuntimeInfo {
    return {
      runtime: this.runtimeName,
      isRemote: true,
      isStandard: false,
      availableIn: [this.runtimeName],
    };
  }
}
