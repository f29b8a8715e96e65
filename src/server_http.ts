import config from './platform/config.js';
import { logger } from './platform/logger.js';
import { createAppContext } from './bootstrap.js';
import { HttpServerAdapter } from './features/http_adapter/HttpServerAdapter.js';

const COMPONENT = 'Main';

async function main() {
    const app = createAppContext(config);
    if (app.status === 'not_ready') {
        logger.warn({
            kind: 'sys',
            component: COMPONENT,
            message: 'Starting in not-ready mode; set the missing variables in .env',
            meta: { missing: app.missing },
        });
    }

    const adapter = new HttpServerAdapter(app, config.server);

    try {
        await adapter.start();

        process.on('SIGINT', () => {
            logger.info({ kind: 'sys', component: COMPONENT, message: 'Stopping server...' });
            adapter
                .stop()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to stop cleanly', error });
                    process.exit(1);
                });
        });
    } catch (error) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to start server', error });
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    logger.error({ kind: 'sys', component: COMPONENT, message: 'Fatal startup error', error });
    process.exit(1);
});
