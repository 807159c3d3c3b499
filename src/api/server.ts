import express, { Express, RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'path';
import { config } from '../config/index.js';
import { createCountriesRoutes } from './routes/countries.routes.js';
import { createPeopleRoutes } from './routes/people.routes.js';
import { createFilesRoutes } from './routes/files.routes.js';
import { createEventRoutes } from './routes/event.routes.js';
import { createAccountsRoutes } from './routes/accounts.routes.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { loggingMiddleware } from './middleware/logging.middleware.js';
import { contextMiddleware } from './middleware/context.middleware.js';
import { CountriesHandler } from '../handlers/countries.handler.js';
import { PeopleHandler } from '../handlers/people.handler.js';
import { FilesHandler } from '../handlers/files.handler.js';
import { EventHandler } from '../handlers/event.handler.js';
import { BulkHandler } from '../handlers/bulk.handler.js';
import { AccountsHandler } from '../handlers/accounts.handler.js';

export interface ServerDependencies {
  actorMiddleware: RequestHandler;
  countriesHandler: CountriesHandler;
  peopleHandler: PeopleHandler;
  filesHandler: FilesHandler;
  eventHandler: EventHandler;
  bulkHandler: BulkHandler;
  accountsHandler: AccountsHandler;
}

export function createServer(dependencies: ServerDependencies): Express {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' }, // Allow flags and photos on other origins
    })
  );

  // CORS configuration
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-Id'],
      credentials: true,
    })
  );

  // Compression middleware
  app.use(compression());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Context middleware (must be before logging)
  app.use(contextMiddleware);

  // Logging middleware
  app.use(loggingMiddleware);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  // API version endpoint
  app.get('/api/version', (req, res) => {
    res.json({
      version: '1.0.0',
      api: 'Registration API',
    });
  });

  const swaggerDocument = YAML.load(path.resolve('swagger/swagger.yaml'));
  swaggerDocument.servers = [
    {
      url: `http://localhost:${config.port}/api`,
      description: `${config.nodeEnv} server`,
    },
  ];
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));

  // Every API route sees the requesting actor
  app.use('/api', dependencies.actorMiddleware);

  // Mount API routes
  app.use('/api', createCountriesRoutes(dependencies.countriesHandler, dependencies.bulkHandler));
  app.use('/api', createPeopleRoutes(dependencies.peopleHandler, dependencies.bulkHandler));
  app.use('/api', createFilesRoutes(dependencies.filesHandler));
  app.use('/api', createEventRoutes(dependencies.eventHandler));
  app.use('/api', createAccountsRoutes(dependencies.accountsHandler));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        kind: 'NotFound',
        message: `Cannot ${req.method} ${req.path}`,
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorMiddleware);

  return app;
}
