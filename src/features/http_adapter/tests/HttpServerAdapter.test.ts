import { request } from 'node:http';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createAppContext } from '../../../bootstrap.js';
import type { ICompletionService } from '../../../core/ports/CompletionService.js';
import { buildConfig } from '../../../platform/config.js';
import { ChatMode } from '../../chat/domain/ChatMode.js';
import { HttpServerAdapter, MAX_BODY_BYTES, readJsonBody } from '../HttpServerAdapter.js';

const roleInstructions = {
    [ChatMode.QA]: 'qa instructions',
    [ChatMode.NORMAL]: 'normal instructions',
};

const completionService: ICompletionService = {
    complete: async () => ({ ok: true, text: 'reply' }),
};

interface ClientResponse {
    status: number;
    headers: Record<string, string | string[] | undefined>;
    body: unknown;
}

function post(port: number, path: string, payload: string): Promise<ClientResponse> {
    return new Promise((resolve, reject) => {
        const req = request(
            {
                host: '127.0.0.1',
                port,
                path,
                method: 'POST',
                agent: false,
                headers: {
                    'Content-Type': 'application/json',
                    'Content-Length': Buffer.byteLength(payload),
                },
            },
            (res) => {
                const chunks: Buffer[] = [];
                res.on('data', (chunk: Buffer) => chunks.push(chunk));
                res.on('end', () => {
                    resolve({
                        status: res.statusCode ?? 0,
                        headers: res.headers,
                        body: JSON.parse(Buffer.concat(chunks).toString('utf-8')),
                    });
                });
                res.on('error', reject);
            }
        );
        req.on('error', reject);
        req.end(payload);
    });
}

describe('readJsonBody', () => {
    it('parses a JSON body', async () => {
        await expect(readJsonBody(Readable.from([Buffer.from('{"password":'), Buffer.from('"x"}')]))).resolves.toEqual({
            password: 'x',
        });
    });

    it('treats an empty body as absent', async () => {
        await expect(readJsonBody(Readable.from([Buffer.from('  ')]))).resolves.toBeUndefined();
    });

    it('rejects malformed JSON with 400', async () => {
        await expect(readJsonBody(Readable.from([Buffer.from('{oops')]))).rejects.toMatchObject({
            status: 400,
            message: 'Request body is not valid JSON',
        });
    });

    it('drains an oversized body to the end before rejecting with 413', async () => {
        let drained = false;
        const source = Readable.from([Buffer.alloc(MAX_BODY_BYTES, 0x20), Buffer.from('{}')]);
        source.on('end', () => {
            drained = true;
        });

        await expect(readJsonBody(source)).rejects.toMatchObject({ status: 413, message: 'Request body too large' });
        expect(drained).toBe(true);
    });
});

describe('HttpServerAdapter', () => {
    let adapter: HttpServerAdapter;
    let port: number;

    beforeEach(async () => {
        const app = createAppContext(buildConfig({ NODE_ENV: 'test', APP_PASSWORD: 'test-secret' }), {
            completionService,
            roleInstructions,
        });
        adapter = new HttpServerAdapter(app, { host: '127.0.0.1', port: 0 });
        await adapter.start();
        const bound = adapter.address();
        if (!bound) throw new Error('adapter is not listening');
        port = bound.port;
    });

    afterEach(async () => {
        await adapter.stop();
    });

    it('answers a JSON request through the router', async () => {
        const response = await post(port, '/api/login', JSON.stringify({ password: 'wrong' }));

        expect(response.status).toBe(401);
        expect(response.body).toEqual({
            error: { kind: 'InvalidCredential', message: 'Invalid password. Please try again.' },
        });
    });

    it('answers an oversized body with 413 instead of resetting the connection', async () => {
        const payload = JSON.stringify({ password: 'x'.repeat(2 * MAX_BODY_BYTES) });

        const response = await post(port, '/api/login', payload);

        expect(response.status).toBe(413);
        expect(response.headers.connection).toBe('close');
        expect(response.body).toEqual({ error: { kind: 'BadRequest', message: 'Request body too large' } });
    });

    it('answers malformed JSON with 400', async () => {
        const response = await post(port, '/api/login', '{not json');

        expect(response.status).toBe(400);
        expect(response.body).toEqual({ error: { kind: 'BadRequest', message: 'Request body is not valid JSON' } });
    });
});
