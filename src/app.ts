// src/app.ts

import express from 'express';
import { AppConfig, loadConfig, StoreDriver } from './config';
import { AppError } from './errors';
import { createPriorityRoutes } from './routes/priorityRoutes';
import { createScheduleRoutes } from './routes/scheduleRoutes';
import { createStaffRoutes } from './routes/staffRoutes';
import { SchedulingService } from './services/schedulingService';
import { MemoryScheduleStore } from './store/memoryScheduleStore';
import { ScheduleStore } from './store/scheduleStore';
import { createSupabaseStoreClient, SupabaseScheduleStore } from './store/supabaseScheduleStore';
import { createLogger, Logger } from './utils/logger';

export interface AppDependencies {
    service: SchedulingService;
    storeDriver: StoreDriver;
    logger?: Logger;
}

/**
 * Client errors raised by express itself (malformed JSON, oversized body)
 */
function clientErrorStatus(err: unknown): number | null {
    if (typeof err === 'object' && err !== null && 'status' in err) {
        const status = err.status;
        if (typeof status === 'number' && status >= 400 && status < 500) {
            return status;
        }
    }
    return null;
}

/**
 * Express application setup
 *
 * The scheduling service (and the store behind it) is built once by the
 * caller and injected; nothing here holds global state.
 */
export function createApp({ service, storeDriver, logger = createLogger('http') }: AppDependencies): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use(createStaffRoutes(service));
    app.use(createScheduleRoutes(service));
    app.use(createPriorityRoutes(service));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            store: storeDriver
        });
    });

    // Error handling
    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof AppError) {
            if (err.status >= 500) {
                logger.error(err.message);
            }
            res.status(err.status).json({ error: err.message, code: err.code });
            return;
        }

        const clientStatus = clientErrorStatus(err);
        if (clientStatus !== null) {
            res.status(clientStatus).json({ error: 'Malformed request body', code: 'BAD_REQUEST' });
            return;
        }

        logger.error('Unhandled error', err);
        res.status(500).json({ error: 'Internal server error', code: 'INTERNAL' });
    });

    return app;
}

/**
 * Build the configured store. The Supabase client is created here, once per process.
 */
export function createStore(config: AppConfig): ScheduleStore {
    if (config.store.driver === 'memory') {
        return new MemoryScheduleStore();
    }
    return new SupabaseScheduleStore(createSupabaseStoreClient(config.store.url, config.store.key));
}

// Start server
if (require.main === module) {
    const config = loadConfig();
    const logger = createLogger('server', config.logLevel);
    const service = new SchedulingService(createStore(config), {
        logger: createLogger('scheduler', config.logLevel)
    });
    const app = createApp({
        service,
        storeDriver: config.store.driver,
        logger: createLogger('http', config.logLevel)
    });

    app.listen(config.port, () => {
        logger.info(`Gate duty scheduler running on port ${config.port} (${config.store.driver} store)`);
    });
}
