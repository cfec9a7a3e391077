import express, { Application } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import rateLimit from 'express-rate-limit';
import { AppConfig } from './config';
import { createRoutes } from './routes';
import { PremiumService } from './services/premium.service';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { setupSwagger } from './swagger';
import { pinoLogger } from './utils/logger';

class App {
  public app: Application;

  constructor(
    private config: AppConfig,
    private premiumService: PremiumService
  ) {
    this.app = express();
    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    // Security middleware; CSP off so the docs UI can load its inline assets
    this.app.use(helmet({
      contentSecurityPolicy: false,
    }));

    this.app.use(
      cors({
        origin: this.config.cors.allowedOrigins,
      })
    );

    if (this.config.rateLimit.enabled) {
      this.app.use(
        rateLimit({
          windowMs: this.config.rateLimit.windowMs,
          limit: this.config.rateLimit.maxRequests,
          standardHeaders: 'draft-7',
          legacyHeaders: false,
          message: {
            success: false,
            message: 'Too many requests from this IP, please try again later.',
          },
        })
      );
    }

    // Request logging
    this.app.use(pinoHttp({ logger: pinoLogger }));

    // Body parsing
    this.app.use(express.json());
  }

  private initializeRoutes(): void {
    // Liveness probe
    this.app.get('/', (req, res) => {
      res.json({ status: 'ok' });
    });

    setupSwagger(this.app);

    this.app.use('/api/v1', createRoutes(this.premiumService));
  }

  private initializeErrorHandling(): void {
    // 404 handler
    this.app.use(notFoundHandler);

    // Global error handler
    this.app.use(errorHandler);
  }
}

export default App;
