import 'express-async-errors';
import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { config, Config } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createStore, Store } from './models/store';
import { createServices, Services } from './services';
import { createAuthRouter } from './routes/auth';
import { createPostsRouter } from './routes/posts';

export interface AppOptions {
  config?: Config;
  store?: Store;
  /** Seconds since the epoch, used when signing and checking tokens. */
  clock?: () => number;
}

export interface App {
  app: Express;
  services: Services;
  store: Store;
}

export function createApp(options: AppOptions = {}): App {
  const cfg = options.config ?? config;
  const store = options.store ?? createStore();
  const services = createServices(store, {
    jwtSecret: cfg.jwt.secret,
    jwtAlgorithm: cfg.jwt.algorithm,
    jwtExpiresInMinutes: cfg.jwt.expiresInMinutes,
    bcryptRounds: cfg.auth.bcryptRounds,
    clock: options.clock,
  });

  const app = express();
  const production = cfg.nodeEnv === 'production';

  // --- Security & logging middleware ---
  app.use(helmet());
  app.use(
    cors({
      origin: production ? cfg.allowedOrigins : '*',
      credentials: true,
    })
  );
  if (cfg.nodeEnv !== 'test') {
    app.use(morgan(production ? 'combined' : 'dev'));
  }

  // --- Rate limiting ---
  app.use(
    rateLimit({
      windowMs: cfg.rateLimit.windowMs,
      max: cfg.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // --- Body parsing ---
  app.use(express.json({ limit: '1mb' }));

  // --- Routes ---
  app.use('/api/auth', createAuthRouter(services));
  app.use('/api/posts', createPostsRouter(services));

  // --- Health check ---
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // --- Fallbacks (must be last) ---
  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, services, store };
}
