import type { ICompletionService } from './core/ports/CompletionService.js';
import { AuthGate } from './features/auth/usecases/AuthGate.js';
import { SessionRegistry } from './features/auth/usecases/SessionRegistry.js';
import { ChatService } from './features/chat/usecases/ChatService.js';
import { ModeRouter } from './features/chat/usecases/ModeRouter.js';
import { AzureOpenAICompletionService } from './infrastructure/ai/AzureOpenAICompletionService.js';
import { loadRoleInstructions, type RoleInstructions } from './infrastructure/prompts/PromptTemplateLoader.js';
import { type Config, findMissingConfig } from './platform/config.js';
import { logger } from './platform/logger.js';

const COMPONENT = 'Bootstrap';

export interface AppServices {
    registry: SessionRegistry;
    authGate: AuthGate;
    chatService: ChatService;
}

export type AppContext =
    | { status: 'ready'; services: AppServices }
    | { status: 'not_ready'; missing: string[] };

export interface AppOverrides {
    completionService?: ICompletionService;
    roleInstructions?: RoleInstructions;
    now?: () => number;
}

/**
 * Builds every service once, after configuration is loaded. Missing required
 * settings or unreadable prompt templates leave the app `not_ready` instead of
 * failing later inside a request.
 */
export function createAppContext(cfg: Config, overrides: AppOverrides = {}): AppContext {
    const missing = findMissingConfig(cfg).filter(
        (name) => !(overrides.completionService && name.startsWith('AZURE_OPENAI_'))
    );

    let roleInstructions = overrides.roleInstructions;
    if (!roleInstructions) {
        try {
            roleInstructions = loadRoleInstructions(cfg.prompts.dir);
        } catch (error) {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to load prompt templates', error });
            missing.push('PROMPT_DIR');
        }
    }

    if (missing.length > 0 || !roleInstructions) {
        logger.error({
            kind: 'sys',
            component: COMPONENT,
            message: 'Configuration incomplete; service is not ready',
            meta: { missing },
        });
        return { status: 'not_ready', missing };
    }

    const registry = new SessionRegistry({
        ttlMinutes: cfg.auth.sessionTtlMinutes,
        maxConcurrentSessions: cfg.auth.maxConcurrentSessions,
        now: overrides.now,
    });
    const authGate = new AuthGate({ sharedSecret: cfg.auth.sharedPassword, registry });
    const completionService = overrides.completionService ?? new AzureOpenAICompletionService(cfg.azure);
    const chatService = new ChatService(new ModeRouter(roleInstructions), completionService);

    logger.info({
        kind: 'sys',
        component: COMPONENT,
        message: 'Service ready',
        meta: {
            maxConcurrentSessions: registry.maxConcurrentSessions,
            sessionTtlMinutes: cfg.auth.sessionTtlMinutes,
            maxUsers: cfg.auth.maxUsers,
            deployments: cfg.azure.deployments,
        },
    });

    return { status: 'ready', services: { registry, authGate, chatService } };
}
