import { TelemetryService } from './app.js';
import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';

async function main() {
    logger.info('Starting vitals telemetry pipeline');

    // Load configuration
    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    const service = new TelemetryService(config);
    await service.start();

    logger.info('Vitals telemetry pipeline running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await service.stop();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ error: err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
