import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { setupSwagger } from './config/swagger';
import { env } from './config/env';
import { SessionService } from './services/session.service';
import { createAuthRouter } from './routes/auth';
import { healthRouter } from './routes/health';
import { requestLogger, errorLogger } from './middleware/logger.middleware';
import { Logger } from './utils/logger';

export interface AppOptions {
  swagger?: boolean;
}

export function createApp(session: SessionService, options: AppOptions = {}): Express {
  const app: Express = express();

  app.use(cors({ origin: env.CORS_ORIGINS.includes('*') ? '*' : env.CORS_ORIGINS }));
  app.use(express.json());
  // OAuth2 password-grant clients post the login form url-encoded
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger);

  if (options.swagger ?? true) {
    const swaggerSpec = setupSwagger();
    app.get('/api-docs/swagger.json', (req: Request, res: Response) => {
      res.json(swaggerSpec);
    });
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  }

  app.use('/health', healthRouter);
  app.use(`${env.API_PREFIX}/auth`, createAuthRouter(session));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: 'Workforce Auth API',
      documentation: '/api-docs',
      health: '/health',
      auth: `${env.API_PREFIX}/auth`,
    });
  });

  app.use(errorLogger);

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    Logger.error('Unhandled application error', err, { method: req.method, url: req.originalUrl });
    res.status(500).json({
      error: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  return app;
}
