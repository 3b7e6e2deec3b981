import express from 'express';
import type { BillRepository, UserRepository } from '../../application/ports.js';
import type { BillDocument, FacilityHeader } from '../../application/billing/billDocument.js';
import { NotFoundError } from '../../application/errors.js';
import type { Logger } from '../logger.js';
import { renderBillPdf } from '../pdf/billPdf.js';
import { createAuthRoutes } from './routes/auth.js';
import { createBillingRoutes } from './routes/billing.js';
import { createDashboardRoutes } from './routes/dashboard.js';
import { createAdminRoutes } from './routes/admin.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { requireLogin } from './middleware/auth.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppDeps {
  userRepo: UserRepository;
  billRepo: BillRepository;
  jwtSecret: string;
  jwtTtlSeconds: number;
  facility: FacilityHeader;
  logger: Logger;
  /** Database ping for /healthz. */
  ping?: () => Promise<unknown>;
  renderPdf?: (doc: BillDocument) => Promise<Buffer>;
  now?: () => Date;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const now = deps.now ?? (() => new Date());
  const { ping } = deps;

  app.use(express.json());
  app.use(requestLogger(deps.logger));
  app.use(createApiRateLimiter());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    if (!ping) {
      res.status(200).json({ status: 'ok' });
      return;
    }
    withTimeout(ping(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use(
    createAuthRoutes(deps.userRepo, { secret: deps.jwtSecret, expiresIn: deps.jwtTtlSeconds }, deps.logger)
  );

  // Everything below requires a logged-in user
  app.use(requireLogin(deps.userRepo, deps.jwtSecret));
  app.use('/admin', createAdminRoutes(deps.userRepo, deps.billRepo, deps.logger));
  app.use(createDashboardRoutes(deps.billRepo, now));
  app.use(
    createBillingRoutes({
      billRepo: deps.billRepo,
      facility: deps.facility,
      renderPdf: deps.renderPdf ?? renderBillPdf,
      now,
      logger: deps.logger,
    })
  );

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
  });

  // Error handler (must be last)
  app.use(createErrorHandler(deps.logger));

  return app;
}
