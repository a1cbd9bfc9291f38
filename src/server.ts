import { env } from './config/env';
import { createApp } from './app';
import { createPortalEngine } from './engine/portal_engine';
import { errorMessage } from './engine/errors';
import { createLogger } from './utils/logger';

const log = createLogger('Server');

const engine = createPortalEngine(env);
const app = createApp(engine, env);

const server = app.listen(env.PORT, () => {
    log.info(`Case tracker API listening on port ${env.PORT} (${env.NODE_ENV})`);
    log.info(`Portal: ${env.PORTAL_BASE_URL} | browser tier: ${env.BROWSER_ENABLED ? 'on' : 'off'}`);
});

let shuttingDown = false;

async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down...`);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await engine.close();
    log.info('Shutdown complete.');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal)
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                log.error(`Shutdown failed: ${errorMessage(error)}`);
                process.exit(1);
            });
    });
}
