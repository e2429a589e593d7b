import { createApp, createDependencies } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('📊 Live Intelligence Pipeline - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Open the cache and wire the pipeline
        console.log('🚀 Initializing application components...');
        const container = await createDependencies(config);
        const app = createApp(container);

        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Cache strategy: ${config.cacheStrategy}`);
        });

        // 3. Drain background refreshes on shutdown
        let shuttingDown = false;
        const shutdown = (signal: string) => {
            if (shuttingDown) return;
            shuttingDown = true;
            console.log(`🛑 ${signal} received, draining background work...`);

            server.close();
            container.close()
                .then(() => {
                    console.log('👋 Shutdown complete');
                    process.exit(0);
                })
                .catch((error) => {
                    console.error('💥 Error during shutdown:', error);
                    process.exit(1);
                });
        };

        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
