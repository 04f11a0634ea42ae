/**
 * Named connections to remote runtimes. Connecting under a name that is
 * already connected returns the existing client.
 */

import { RemoteRuntimeClient, type RemoteRuntimeClientOptions } from './client';

export class RuntimeManager {
  private connections = new Map<string, RemoteRuntimeClient>();

  constructor(private readonly clientOptions: RemoteRuntimeClientOptions = {}) {}

  connectRuntime(name: string, address: string): RemoteRuntimeClient {
    let client = this.connections.get(name);
    if (!client) {
      client = new RemoteRuntimeClient(address, this.clientOptions);
      this.connections.set(name, client);
    }
    return client;
  }

  getRuntime(name: string): RemoteRuntimeClient | undefined {
    return this.connections.get(name);
  }

  disconnectRuntime(name: string): void {
    const client = this.connections.get(name);
    if (!client) return;
    client.close();
    this.connections.delete(name);
  }

  disconnectAll(): void {
    for (const client of this.connections.values()) {
      client.close();
    }
    this.connections.clear();
  }

  listConnections(): string[] {
    return Array.from(this.connections.keys());
  }

  isConnected(name: string): boolean {
    return this.connections.has(name);
  }
}
