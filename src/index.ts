// src/index.ts

import { loadConfig, loadEnvFile } from '@/config';
import { Application } from '@/app';
import { ConfigError } from '@/utils/errors';
import { createServiceLogger, setLogLevel } from '@/utils/logger';

loadEnvFile();

const logger = createServiceLogger('Main');

const main = async (): Promise<number> => {
    const runOnce = process.argv.includes('--once');

    let app: Application;
    try {
        const config = loadConfig();
        setLogLevel(config.app.logLevel);
        app = new Application(config);
    } catch (error: unknown) {
        if (error instanceof ConfigError) {
            logger.error('Invalid configuration', error);
            return 1;
        }
        throw error;
    }

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}, shutting down gracefully`);
        app.stop();
        process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    await app.initialize();

    if (runOnce) {
        const report = await app.runOnce();
        logger.info('Single cycle finished', {
            outcome: report.outcome,
            topic: report.topic,
            posts: report.posts.map(post => `${post.platform}:${post.status}`)
        });
        return 0;
    }

    await app.start();
    return 0;
};

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        logger.error('Application crashed', error);
        process.exitCode = 1;
    });
