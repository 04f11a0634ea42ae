// src/core/eval/standard.ts
// Interpreter with the core vocabulary imported

import { CORE_MODULE_NAME, createCoreModule } from "../modules/core";
import { Interpreter, type InterpreterOptions } from "./interpreter";

/**
 * Imports `core` first, so it is searched last and user modules and
 * definitions can shadow its words. The registry's `core` is used when it
 * has one.
 */
export class StandardInterpreter extends Interpreter {
  constructor(options: InterpreterOptions = {}) {
    super({ ...options, modules: [] });

    let core = this.registry.get(CORE_MODULE_NAME);
    if (!core) {
      core = createCoreModule();
      this.registerModule(core);
    }
    this.importOnConstruction(core);

    for (const module of options.modules ?? []) {
      this.registerModule(module);
      this.importOnConstruction(module);
    }
  }

  duplicate(): StandardInterpreter {
    const result = new StandardInterpreter({
      registry: this.registry,
      timezone: this.timezone,
      maxAttempts: this.maxAttempts,
      errorHandler: this.errorHandler,
    });
    this.copyInto(result);
    return result;
  }
}
