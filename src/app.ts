// =============================================================================
// CASE EVALUATION — Express Application
//
//   /api/health    : store health probe (unauthenticated)
//   /api/auth/*    : caller identity, PIN check (strict rate limit)
//   /api/profiles/*: Role Directory
//   /api/cases/*   : Case Catalog
//   /api/sessions/*: sessions and their per-format ratings
//   /api/progress/*: dashboards
//   /api/audit/*   : audit trail (admin)
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { rateLimit } from 'express-rate-limit';
import { config } from './config';
import { errorHandler, notFoundHandler, requestId, requestSanitization } from './middleware/security';
import { Services } from './services';
import { authRoutes } from './routes/auth';
import { profileRoutes } from './routes/profiles';
import { caseRoutes } from './routes/cases';
import { sessionRoutes } from './routes/sessions';
import { progressRoutes } from './routes/progress';
import { auditRoutes } from './routes/audit';

export interface AppOptions {
  /** Requests per minute per IP on the API routes */
  rateLimitMax?: number;
}

export function createApp(services: Services, options: AppOptions = {}): Express {
  const app = express();
  const apiMax = options.rateLimitMax ?? config.rateLimit.apiMaxPerMinute;

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : false,
  }));
  app.use(express.json({ limit: '10mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  // PIN guessing is bounded by the auth limiter.
  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: Math.max(Math.floor(apiMax / 4), 5),
    message: { error: 'Too many authentication attempts. Try again later.', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: apiMax,
    message: { error: 'Too many requests', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', async (_req, res, next) => {
    try {
      const storeStart = Date.now();
      const available = await services.store.isAvailable();
      const store = {
        name: services.store.name,
        status: available ? 'healthy' : 'unhealthy',
        latencyMs: Date.now() - storeStart,
      };

      res.status(available ? 200 : 503).json({
        status: available ? 'healthy' : 'degraded',
        service: 'case-evaluation',
        uptime: Math.floor((Date.now() - startTime) / 1000),
        checks: { store },
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      next(err);
    }
  });

  app.use('/api/auth', authLimiter, authRoutes(services));
  app.use('/api/profiles', apiLimiter, profileRoutes(services));
  app.use('/api/cases', apiLimiter, caseRoutes(services));
  app.use('/api/sessions', apiLimiter, sessionRoutes(services));
  app.use('/api/progress', apiLimiter, progressRoutes(services));
  app.use('/api/audit', apiLimiter, auditRoutes(services));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
