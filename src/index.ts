import { config } from './config/index.js';
import { loadEventSettings } from './config/event.js';
import { RosterIndex, loadRoster } from './config/roster.js';
import { createServer } from './api/server.js';
import { createServerDependencies } from './api/dependencies.js';
import { DatabaseConnection } from './db/database.js';
import { KnexRegistrationStore } from './db/knexRegistrationStore.js';
import { buildRoleTable } from './domain/roles.js';
import { AccountsService } from './services/auth/accounts.service.js';
import { Argon2PasswordHasher } from './services/auth/passwordHasher.js';
import { MinioStorageService } from './services/storage/minio.service.js';
import {
  DisabledNotificationQueue,
  JobQueueService,
  NotificationQueue,
} from './services/queue/jobQueue.service.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info('Starting registration service...');

  try {
    // Event rulebook and optional roster of earlier events
    const settings = loadEventSettings(config.eventConfigPath);
    let roster: RosterIndex | null = null;
    if (settings.rosterPath) {
      roster = loadRoster(settings.rosterPath);
    }
    logger.info(
      { event: `${settings.shortName} ${settings.year}`, roster: roster !== null },
      'Event settings loaded'
    );

    // Initialize database
    logger.info('Initializing database...');
    const dbConnection = new DatabaseConnection({
      connectionString: config.databaseUrl,
    });
    await dbConnection.initialize();
    const store = new KnexRegistrationStore(dbConnection.getAdapter());

    // Initialize services
    logger.info('Initializing services...');
    const storage = new MinioStorageService();
    let jobQueue: JobQueueService | null = null;
    let notifications: NotificationQueue = new DisabledNotificationQueue();
    if (config.notificationsEnabled) {
      jobQueue = new JobQueueService(config.databaseUrl);
      await jobQueue.start();
      notifications = jobQueue;
    }

    const accounts = new AccountsService(store, new Argon2PasswordHasher(), {
      admin: config.adminPassword,
      scoring: config.scoringPassword,
    });
    const app = createServer(
      createServerDependencies(
        {
          store,
          storage,
          notifications,
          settings,
          roles: buildRoleTable(settings),
          roster,
        },
        accounts
      )
    );

    const port = config.port;

    const server = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/health`);
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      // Stop accepting new connections
      server.close(() => {
        logger.info('HTTP server closed');
      });

      // Stop job queue
      await jobQueue?.stop();

      // Close database
      await dbConnection.close();

      logger.info('Graceful shutdown complete');
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error) => {
        logger.fatal({ err: error }, 'Graceful shutdown failed');
        process.exit(1);
      });
    };
    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.fatal({ reason, promise }, 'Unhandled Rejection');
  process.exit(1);
});

// Start the application
main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});
