/* eslint-disable no-console */
import { createServer } from 'http';
import {
    AdvisoryComparator,
    OpenMeteoClient,
    RefreshingCache,
    createFleetLoader,
    describeError,
    loadPointStore
} from '@engine/index';
import { createApp } from './app';
import { loadConfig } from './config';

async function startServer() {
    const config = loadConfig();

    const points = await loadPointStore(config.pointsFile);
    console.log(`[server] Loaded ${points.size} points from ${config.pointsFile}`);

    const client = new OpenMeteoClient({ timeoutMs: config.providerTimeoutMs });
    const cache = new RefreshingCache({
        load: createFleetLoader(points.all(), {
            client,
            concurrency: config.fleetConcurrency,
            limit: config.topLimit
        }),
        ttlMs: config.cacheTtlMs,
        refreshTimeoutMs: config.refreshTimeoutMs,
        warmTimeoutMs: config.warmTimeoutMs
    });
    const advisory = new AdvisoryComparator({
        points,
        client,
        horizonDays: config.advisoryHorizonDays
    });

    console.log('[server] Warming destination cache...');
    try {
        await cache.warm();
        console.log('[server] Cache warmed');
    } catch (error) {
        console.error('[server] Failed to warm cache; serving will retry on demand', {
            error: describeError(error)
        });
    }

    const lifetime = new AbortController();
    cache.startBackgroundRefresh(lifetime.signal);

    const app = createApp({
        cache,
        advisory,
        points,
        topRequestTimeoutMs: config.topRequestTimeoutMs,
        topLimit: config.topLimit
    });
    const server = createServer(app);

    const shutdown = (signal: NodeJS.Signals) => {
        console.log('[server] Shutdown signal received', { signal });
        lifetime.abort();

        const forceExit = setTimeout(() => {
            console.error('[server] Graceful shutdown timed out; closing connections');
            server.closeAllConnections();
            process.exit(1);
        }, config.shutdownTimeoutMs);
        forceExit.unref();

        server.close((error) => {
            if (error) {
                console.error('[server] Close failed', { error: error.message });
                process.exit(1);
            }
            console.log('[server] Stopped gracefully');
            process.exit(0);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    server.listen(config.port, () => {
        console.log(`Server running on http://localhost:${config.port}/`);
    });
}

startServer().catch((error: unknown) => {
    console.error('[server] Fatal startup error', { error: describeError(error) });
    process.exit(1);
});
