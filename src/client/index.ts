export { RemoteRuntimeClient, normalizeAddress, type RemoteRuntimeClientOptions } from './client';
export { RemoteExecutionError, RemoteRuntimeError, parseErrorInfo } from './errors';
export { RemoteWord, type RuntimeInfo } from './remoteWord';
export { RemoteModule } from './remoteModule';
export { RuntimeManager } from './runtimeManager';
export { REMOTE_RUNTIME_MODULE_NAME, createRemoteRuntimeModule } from './remoteRuntimeModule';
