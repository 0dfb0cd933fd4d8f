/**
 * @fileoverview Application entry point.
 *
 * Builds the Express app, runs the module lifecycle and starts listening.
 *
 * @module index
 */

import http from 'node:http';
import { env } from './config/env.js';
import { createExpressApp, finalizeExpressApp } from './loaders/express.js';
import { loadModules } from './loaders/modules.js';
import { logger } from './lib/logger.js';

async function bootstrap(): Promise<void> {
    try {
        const app = createExpressApp(env);
        await loadModules(app, env);
        finalizeExpressApp(app);

        const server = http.createServer(app);
        server.listen(env.PORT, () => {
            logger.info({ port: env.PORT }, 'Server listening');
        });

        process.on('SIGINT', () => {
            logger.info('Received SIGINT, shutting down');
            server.close(() => process.exit(0));
        });
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();
