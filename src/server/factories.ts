/**
 * Modules this build can instantiate from configuration, keyed by the
 * `import_path` a modules config names them with.
 */

import { ModuleFactoryRegistry } from '../core/modules/loader';
import { createRemoteRuntimeModule } from '../client/remoteRuntimeModule';

export const REMOTE_RUNTIME_IMPORT_PATH = 'forthic.client:remote_runtime';

export function defaultModuleFactories(): ModuleFactoryRegistry {
  return new ModuleFactoryRegistry().register(REMOTE_RUNTIME_IMPORT_PATH, () => createRemoteRuntimeModule());
}
