import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { logError, logInfo, logWarn } from '../logger.js';
import { getErrorMessage } from '../utils.js';
import { authorizeDelivery } from './auth.js';

export interface DeliveryHandlerResult {
  handled: boolean;
  reason?: string;
}

interface PushDeliveryServerOptions {
  enabled: boolean;
  host: string;
  port: number;
  path: string;
  secret: string;
  maxBodyBytes?: number;
  onNotification: (payload: unknown) => DeliveryHandlerResult | Promise<DeliveryHandlerResult>;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`payload too large (limit ${limit} bytes)`);
    this.name = 'PayloadTooLargeError';
  }
}

/** HTTP ingress that hands each delivered push payload to the notification callback. */
export class PushDeliveryServer {
  private readonly opts: PushDeliveryServerOptions;
  private readonly maxBodyBytes: number;
  private server: Server | null = null;

  constructor(opts: PushDeliveryServerOptions) {
    this.opts = opts;
    this.maxBodyBytes = Math.max(1024, Math.floor(opts.maxBodyBytes ?? 64 * 1024));
  }

  async start(): Promise<void> {
    if (!this.opts.enabled || this.server) {
      return;
    }

    const server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.opts.port, this.opts.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    logInfo(`Push delivery listening on http://${this.opts.host}:${this.port()}${this.opts.path}`);
  }

  /** Bound port; differs from the configured one when listening on port 0. */
  port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.opts.port;
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }
    const server = this.server;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== this.opts.path) {
      this.respondJson(res, 404, { ok: false, error: 'Not found' });
      return;
    }

    if (req.method !== 'POST') {
      this.respondJson(res, 405, { ok: false, error: 'Method not allowed' });
      return;
    }

    const auth = authorizeDelivery({ headers: req.headers, secret: this.opts.secret });
    if (!auth.authorized) {
      logWarn(`Rejected push delivery (${auth.reasonCode})`);
      this.respondJson(res, 401, { ok: false, error: 'Unauthorized' });
      return;
    }

    let payload: unknown;
    try {
      const body = await this.readBody(req);
      payload = JSON.parse(body);
    } catch (error) {
      this.respondJson(res, error instanceof PayloadTooLargeError ? 413 : 400, {
        ok: false,
        error: getErrorMessage(error),
      });
      return;
    }

    try {
      const result = await this.opts.onNotification(payload);
      this.respondJson(res, 200, {
        ok: true,
        handled: result.handled,
        ...(result.reason ? { reason: result.reason } : {}),
      });
    } catch (error) {
      logError('Push delivery handler failed', error);
      this.respondJson(res, 500, { ok: false, error: 'Internal error' });
    }
  }

  private async readBody(req: IncomingMessage): Promise<string> {
    return await new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        if (tooLarge) {
          return;
        }
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          tooLarge = true;
          reject(new PayloadTooLargeError(this.maxBodyBytes));
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        resolve(Buffer.concat(chunks).toString('utf8'));
      });

      req.on('error', (error) => {
        reject(error);
      });
    });
  }

  private respondJson(res: ServerResponse, status: number, payload: Record<string, unknown>): void {
    res.statusCode = status;
    res.setHeader('content-type', 'application/json; charset=utf-8');
    res.end(JSON.stringify(payload));
  }
}
