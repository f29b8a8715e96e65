import { describe, it, expect } from 'vitest';
import { createAppContext } from '../bootstrap.js';
import type { ICompletionService } from '../core/ports/CompletionService.js';
import { ChatMode } from '../features/chat/domain/ChatMode.js';
import { buildConfig } from '../platform/config.js';

const roleInstructions = {
    [ChatMode.QA]: 'qa instructions',
    [ChatMode.NORMAL]: 'normal instructions',
};

const completionService: ICompletionService = {
    complete: async () => ({ ok: true, text: 'reply' }),
};

const fullEnv = {
    NODE_ENV: 'test',
    APP_PASSWORD: 'test-secret',
    AZURE_OPENAI_API_KEY: 'test-key',
    AZURE_OPENAI_ENDPOINT: 'https://example.test',
};

describe('createAppContext', () => {
    it('is ready when every required setting is present', () => {
        const app = createAppContext(buildConfig(fullEnv), { roleInstructions });
        expect(app.status).toBe('ready');
    });

    it('lists missing settings by name', () => {
        const app = createAppContext(buildConfig({ NODE_ENV: 'test', AZURE_OPENAI_API_KEY: 'test-key' }), {
            roleInstructions,
        });
        expect(app).toEqual({ status: 'not_ready', missing: ['APP_PASSWORD', 'AZURE_OPENAI_ENDPOINT'] });
    });

    it('does not need Azure settings when a completion service is supplied', () => {
        const app = createAppContext(buildConfig({ NODE_ENV: 'test', APP_PASSWORD: 'test-secret' }), {
            roleInstructions,
            completionService,
        });
        expect(app.status).toBe('ready');
    });

    it('is not ready when the prompt templates cannot be read', () => {
        const app = createAppContext(buildConfig({ ...fullEnv, PROMPT_DIR: '/nonexistent/prompt-dir' }));
        expect(app).toEqual({ status: 'not_ready', missing: ['PROMPT_DIR'] });
    });

    it('loads the shipped templates by default', () => {
        const app = createAppContext(buildConfig(fullEnv));
        expect(app.status).toBe('ready');
    });

    it('admits exactly the configured number of concurrent sessions', () => {
        const app = createAppContext(
            buildConfig({ ...fullEnv, MAX_CONCURRENT_SESSIONS: '4', MAX_USERS: '3' }),
            { roleInstructions }
        );
        if (app.status !== 'ready') throw new Error('expected a ready context');

        const admitted = [1, 2, 3, 4, 5].map(() => app.services.authGate.login('test-secret').ok);

        expect(app.services.registry.maxConcurrentSessions).toBe(4);
        expect(admitted).toEqual([true, true, true, true, false]);
        expect(app.services.registry.size()).toBe(4);
    });

    it('uses the configured cap when it is below the user ceiling', () => {
        const app = createAppContext(buildConfig({ ...fullEnv, MAX_CONCURRENT_SESSIONS: '1' }), { roleInstructions });
        if (app.status !== 'ready') throw new Error('expected a ready context');
        expect(app.services.registry.maxConcurrentSessions).toBe(1);
    });
});
