import { createApp } from './app.js';
import { ensureStorePath, loadConfig } from './config.js';
import { logJson } from './middleware/logger.js';
import { ConfigError } from './model/errors.js';
import { AuthorizedAppRegistry } from './store/authorizedApps.js';
import { FileExposureStore } from './store/exposureStore.js';

function main() {
    const cfg = loadConfig();
    ensureStorePath(cfg.exposureStorePath);
    const registry = AuthorizedAppRegistry.fromFile(cfg.authorizedAppsPath);
    const store = new FileExposureStore(cfg.exposureStorePath);

    if (cfg.skipKeyStillValidCheck) {
        logJson({ level: 'warn', event: 'config', message: 'SKIP_KEY_DATE_VALIDATION is enabled; still-valid keys are accepted' });
    }

    const app = createApp(cfg, { registry, store });
    app.listen(cfg.port, () => {
        logJson({ level: 'info', event: 'listening', port: cfg.port, authorizedApps: registry.size });
    });
}

try {
    main();
} catch (err) {
    const code = err instanceof ConfigError ? err.code : 'STARTUP_FAILED';
    const message = err instanceof Error ? err.message : String(err);
    const details = err instanceof Error && err.cause !== undefined ? String(err.cause) : undefined;
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ error: { code, message, details } }, null, 2));
    process.exit(1);
}
