import { createApp, createDependencies } from './presentation/app';
import { loadConfig, validateConfig } from './config';

/** Interval of the expired-entry sweep of the generated image cache */
const CACHE_SWEEP_INTERVAL_MS = 60000;

async function main(): Promise<void> {
    console.log('🖼️  Slide Image Selector - starting...');

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

        // 2. Create and start the app
        console.log('🚀 Initializing application components...');
        const deps = createDependencies(config);
        const app = createApp(config, deps);

        const sweep = setInterval(() => {
            const removed = deps.cache.cleanup();
            if (removed > 0) {
                console.log(`[Cache] Removed ${removed} expired generated images`);
            }
        }, CACHE_SWEEP_INTERVAL_MS);
        sweep.unref();

        app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Public base URL: ${config.publicBaseUrl}`);
        });
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
