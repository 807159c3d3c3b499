import PgBoss from 'pg-boss';
import { logger } from '../../utils/logger.js';

export const REGISTRATION_NOTIFICATION_QUEUE = 'registration-notification';

export interface RegistrationNotificationJobData {
  entity: 'country' | 'person' | 'event' | 'scores';
  id: string;
  action: 'created' | 'updated' | 'retired' | 'bulk-created';
  actor: string;
  correlationId?: string;
}

export interface NotificationQueue {
  /**
   * Never throws: the mutation has already committed when this runs.
   */
  enqueueRegistrationNotification(data: RegistrationNotificationJobData): Promise<string | null>;
}

export class JobQueueService implements NotificationQueue {
  private boss: PgBoss;

  constructor(connectionString: string) {
    this.boss = new PgBoss(connectionString);
  }

  async start(): Promise<void> {
    await this.boss.start();

    // Create queues if they don't exist
    await this.boss.createQueue(REGISTRATION_NOTIFICATION_QUEUE);
    logger.info('Job queue started');
  }

  async stop(): Promise<void> {
    await this.boss.stop();
    logger.info('Job queue stopped');
  }

  async enqueueRegistrationNotification(
    data: RegistrationNotificationJobData
  ): Promise<string | null> {
    try {
      const jobId = await this.boss.send(REGISTRATION_NOTIFICATION_QUEUE, data, {
        retryLimit: 3,
        retryDelay: 30,
        retryBackoff: true,
        expireInHours: 1,
      });

      logger.debug(
        { jobId, entity: data.entity, id: data.id, correlationId: data.correlationId },
        'Registration notification job enqueued'
      );
      return jobId || null;
    } catch (error) {
      logger.error(
        { err: error, entity: data.entity, id: data.id },
        'Failed to enqueue registration notification job'
      );
      return null;
    }
  }
}

/**
 * Used when NOTIFICATIONS_ENABLED=false.
 */
export class DisabledNotificationQueue implements NotificationQueue {
  async enqueueRegistrationNotification(
    data: RegistrationNotificationJobData
  ): Promise<string | null> {
    logger.debug({ entity: data.entity, id: data.id }, 'Notifications disabled, skipping');
    return null;
  }
}
