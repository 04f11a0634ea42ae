/**
 * Runtime Server - HTTP + WebSocket transport for the remote bridge
 *
 * Exposes an IRuntimeService through:
 * - POST /rpc/<Method> with the request message as the JSON body
 * - a WebSocket at /ws carrying { id, method, request } frames
 */

import express, { Request, Response, NextFunction } from 'express';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createServer } from 'http';
import type { AddressInfo } from 'net';
import { ModuleImportError, RequestTimeoutError, WireFormatError } from '../core/errors';
import { createLogger } from '../core/log';
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from '../core/config/config';
import { buildErrorInfo } from './errorInfo';
import { RUNTIME_METHODS, isRuntimeMethod, type IRuntimeService, type RpcReply, type RuntimeMethod } from './runtimeService';
import { parseExecuteSequenceRequest, parseExecuteWordRequest, parseGetModuleInfoRequest } from './serializer';

const log = createLogger('server');

// ============================================================
// RUNTIME SERVER IMPLEMENTATION
// ============================================================

export class RuntimeServer {
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private config: ServerConfig;

  constructor(private readonly service: IRuntimeService, config: Partial<ServerConfig> = {}) {
    this.config = { ...DEFAULT_SERVER_CONFIG, ...config };
    this.app = express();
    this.app.use(express.json({ limit: '10mb' }));
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupRoutes();
    this.setupWebSocket();
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', this.config.corsOrigin);
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  // Malformed JSON bodies arrive here from express.json()
  private bodyErrorMiddleware = (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: buildErrorInfo(new WireFormatError(`Invalid JSON body: ${err.message}`)) });
      return;
    }
    next(err);
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;

    app.get('/health', async (_req, res) => {
      try {
        const { modules } = await this.service.listModules({});
        res.json({ status: 'ok', runtime: 'typescript', modules: modules.length });
      } catch (e) {
        res.status(500).json({ error: buildErrorInfo(e) });
      }
    });

    app.post('/rpc/:method', async (req, res) => {
      const method = req.params.method;
      if (!isRuntimeMethod(method)) {
        res.status(404).json({ error: buildErrorInfo(new WireFormatError(`Unknown method: ${method}`)) });
        return;
      }
      try {
        res.json(await this.invoke(method, req.body));
      } catch (e) {
        res.status(statusFor(e)).json({ error: buildErrorInfo(e, { method }) });
      }
    });

    app.use(this.bodyErrorMiddleware);
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', ws => {
      log.debug('WebSocket client connected');
      ws.on('message', data => {
        this.handleFrame(data).then(
          reply => send(ws, reply),
          e => log.error(`WebSocket frame failed: ${e instanceof Error ? e.message : String(e)}`)
        );
      });
      ws.on('close', () => log.debug('WebSocket client disconnected'));
    });
  }

  private async handleFrame(data: RawData): Promise<RpcReply> {
    let frame: unknown;
    try {
      frame = JSON.parse(data.toString());
    } catch (e) {
      return { id: null, error: buildErrorInfo(new WireFormatError(`Invalid JSON frame: ${e instanceof Error ? e.message : String(e)}`)) };
    }
    if (typeof frame !== 'object' || frame === null || Array.isArray(frame)) {
      return { id: null, error: buildErrorInfo(new WireFormatError('Frame must be an object')) };
    }

    const id = 'id' in frame && (typeof frame.id === 'string' || typeof frame.id === 'number') ? frame.id : null;
    const method = 'method' in frame && typeof frame.method === 'string' ? frame.method : '';
    if (!isRuntimeMethod(method)) {
      return { id, error: buildErrorInfo(new WireFormatError(`Unknown method: ${method || '<missing>'}`)) };
    }

    try {
      const request = 'request' in frame ? frame.request : {};
      return { id, response: await this.invoke(method, request) };
    } catch (e) {
      return { id, error: buildErrorInfo(e, { method }) };
    }
  }

  // ─────────────────────────────────────────────────────────────
  // DISPATCH
  // ─────────────────────────────────────────────────────────────

  /**
   * Validate the request, call the service and apply the request timeout.
   * Execution timeouts are reported inside the response like any other
   * execution failure.
   */
  async invoke(method: RuntimeMethod, body: unknown): Promise<unknown> {
    switch (method) {
      case 'ExecuteWord': {
        const request = parseExecuteWordRequest(body);
        return this.withTimeout(method, this.service.executeWord(request)).catch(e => {
          if (!(e instanceof RequestTimeoutError)) throw e;
          return { result_stack: [], error: buildErrorInfo(e, { word_name: request.word_name }) };
        });
      }
      case 'ExecuteSequence': {
        const request = parseExecuteSequenceRequest(body);
        return this.withTimeout(method, this.service.executeSequence(request)).catch(e => {
          if (!(e instanceof RequestTimeoutError)) throw e;
          return { result_stack: [], error: buildErrorInfo(e, { word_sequence: request.word_names.join(' ') }) };
        });
      }
      case 'ListModules':
        return this.withTimeout(method, this.service.listModules({}));
      case 'GetModuleInfo':
        return this.withTimeout(method, this.service.getModuleInfo(parseGetModuleInfoRequest(body)));
    }
  }

  private withTimeout<T>(method: string, work: Promise<T>): Promise<T> {
    const ms = this.config.requestTimeoutMs;
    if (ms <= 0) return work;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new RequestTimeoutError(method, ms)), ms);
    });
    return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /** Listen and resolve with the bound port (useful with port 0). */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        const port = this.port;
        log.info(`Forthic runtime server listening on http://${this.config.host}:${port}`);
        log.info(`   RPC: POST /rpc/{${RUNTIME_METHODS.join(',')}}`);
        log.info(`   WebSocket: ws://${this.config.host}:${port}/ws`);
        resolve(port);
      });
    });
  }

  get port(): number {
    const address = this.server.address();
    return isAddressInfo(address) ? address.port : this.config.port;
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

function statusFor(error: unknown): number {
  if (error instanceof WireFormatError) return 400;
  if (error instanceof ModuleImportError) return 404;
  if (error instanceof RequestTimeoutError) return 504;
  return 500;
}

function send(ws: WebSocket, reply: RpcReply) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(reply));
  }
}
