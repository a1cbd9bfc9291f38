import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { Env } from './config/env';
import { PortalEngine } from './engine/portal_engine';
import { requestId } from './middleware/request_id';
import { errorHandler, notFound } from './middleware/error_handler';
import { createLogger } from './utils/logger';

// Route Imports
import statesRoutes from './routes/states';
import commissionsRoutes from './routes/commissions';
import casesRoutes from './routes/cases';

const log = createLogger('API');

export type AppConfig = Pick<Env, 'NODE_ENV' | 'CORS_ORIGIN' | 'API_RATE_LIMIT_PER_15_MIN'>;

export function createApp(engine: PortalEngine, config: AppConfig) {
    const app = express();

    // Behind one load balancer hop
    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: config.API_RATE_LIMIT_PER_15_MIN,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    const allowedOrigins = config.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean);
    const allowAny = allowedOrigins.includes('*');

    // Middleware
    app.use(requestId);
    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    app.use(morgan('dev', { skip: () => config.NODE_ENV === 'test' }));
    app.use(cors({
        origin: (origin, callback) => {
            // Allow curl and server-to-server callers (no origin)
            if (!origin || allowAny || allowedOrigins.includes(origin)) return callback(null, true);
            log.warn(`Blocked CORS origin: ${origin}`);
            callback(null, false);
        },
        exposedHeaders: ['X-Request-Id'],
    }));

    // Health Check
    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: config.NODE_ENV,
            version: process.env.npm_package_version ?? '1.0.0',
            timestamp: new Date().toISOString(),
        });
    });

    // Routes
    app.use('/api', limiter);
    app.use('/api/v1/states', statesRoutes(engine));
    app.use('/api/v1/commissions', commissionsRoutes(engine));
    app.use('/api/v1/cases', casesRoutes(engine));

    app.use(notFound);
    app.use(errorHandler);

    return app;
}
