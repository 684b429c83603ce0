import 'reflect-metadata';
import { createApp } from './app';
import { loadConfig } from './config';
import { createDataSource } from './database';
import { createLogger } from './logger';
import { AppointmentService } from './services/appointmentService';
import { NotificationService } from './services/notificationService';
import { PrescriptionStore } from './services/prescriptionStore';

const bootstrap = async (): Promise<void> => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logger.level });

  const dataSource = createDataSource(config);
  await dataSource.initialize();
  logger.info('Database connected successfully');

  const app = createApp({
    store: new PrescriptionStore(dataSource),
    verifier: new AppointmentService(config.appointmentService),
    notifier: new NotificationService({ ...config.notificationService, logger }),
    logger,
    isProduction: config.isProd,
  });

  const server = app.listen(config.server.port, () => {
    logger.info(
      {
        port: config.server.port,
        environment: config.env,
        appointmentService: config.appointmentService.baseUrl,
        notificationService: config.notificationService.baseUrl,
      },
      'Server running'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      dataSource
        .destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to close database connection');
          process.exit(1);
        });
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
};

bootstrap().catch((error: unknown) => {
  createLogger().fatal({ err: error }, 'Startup failed');
  process.exit(1);
});
