import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Readable } from 'node:stream';
import type { AppContext } from '../../bootstrap.js';
import { errLog, logger } from '../../platform/logger.js';
import { generateTraceId, runWithTraceId } from '../../platform/tracing.js';
import { type ApiResponse, handleApiRequest } from './apiRouter.js';

const COMPONENT = 'HttpServer';

/** Request bodies above this size are rejected */
export const MAX_BODY_BYTES = 1024 * 1024;

class BodyError extends Error {
    constructor(message: string, readonly status: number) {
        super(message);
        this.name = 'BodyError';
    }
}

/**
 * Buffers and parses a JSON body. Past the size limit it stops buffering but
 * keeps draining, so the 413 can still be written on an intact socket.
 */
export function readJsonBody(req: Readable): Promise<unknown> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let tooLarge = false;

        req.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (tooLarge) return;
            if (size > MAX_BODY_BYTES) {
                tooLarge = true;
                chunks.length = 0;
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            if (tooLarge) {
                reject(new BodyError('Request body too large', 413));
                return;
            }
            const raw = Buffer.concat(chunks).toString('utf-8').trim();
            if (!raw) {
                resolve(undefined);
                return;
            }
            try {
                resolve(JSON.parse(raw));
            } catch {
                reject(new BodyError('Request body is not valid JSON', 400));
            }
        });
        req.on('error', reject);
    });
}

function sendJson(res: ServerResponse, response: ApiResponse, headers: Record<string, string> = {}): void {
    const payload = JSON.stringify(response.body);
    res.writeHead(response.status, {
        'Content-Type': 'application/json; charset=utf-8',
        'Content-Length': Buffer.byteLength(payload),
        'Cache-Control': 'no-store',
        ...headers,
    });
    res.end(payload);
}

/**
 * HTTP Adapter (Layer 1 Interface)
 * 职责：
 * 1. 监听 HTTP 请求，解析 JSON
 * 2. 每个请求包裹 traceId
 * 3. 交给 apiRouter 处理并写回响应
 */
export class HttpServerAdapter {
    private server: Server | null = null;

    constructor(
        private readonly app: AppContext,
        private readonly options: { host: string; port: number }
    ) {}

    async start(): Promise<void> {
        if (this.server) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Already listening' });
            return;
        }

        const server = createServer((req, res) => {
            runWithTraceId(generateTraceId(), () => this._handle(req, res)).catch((error: unknown) => {
                errLog('sys', COMPONENT, 'Unhandled request failure', error, { method: req.method, url: req.url });
                if (!res.headersSent) {
                    sendJson(res, { status: 500, body: { error: { kind: 'Internal', message: 'Internal server error' } } });
                }
            });
        });

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this.options.port, this.options.host, () => {
                server.off('error', reject);
                resolve();
            });
        });

        this.server = server;
        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Service is online',
            meta: { host: this.options.host, port: this.options.port, status: this.app.status },
        });
    }

    /** Bound address once listening; the port is real even when 0 was requested */
    address(): { host: string; port: number } | null {
        const bound = this.server?.address();
        if (!bound || typeof bound === 'string') return null;
        return { host: bound.address, port: bound.port };
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Service stopped' });
    }

    private async _handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const url = new URL(req.url ?? '/', 'http://localhost');
        const method = req.method ?? 'GET';

        let body: unknown;
        try {
            body = method === 'GET' ? undefined : await readJsonBody(req);
        } catch (error) {
            if (error instanceof BodyError) {
                sendJson(
                    res,
                    { status: error.status, body: { error: { kind: 'BadRequest', message: error.message } } },
                    error.status === 413 ? { Connection: 'close' } : {}
                );
                return;
            }
            throw error;
        }

        const response = await handleApiRequest(this.app, {
            method,
            path: url.pathname,
            query: url.searchParams,
            authorization: req.headers.authorization,
            body,
        });
        sendJson(res, response);
    }
}
