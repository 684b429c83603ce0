import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Logger } from './logger';
import { correlation, CORRELATION_HEADER } from './middleware/correlation';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createPrescriptionRoutes } from './routes/prescriptions';
import { AppointmentVerifier } from './services/appointmentService';
import { NotificationEmitter } from './services/notificationService';
import { PrescriptionStore } from './services/prescriptionStore';

export const SERVICE_NAME = 'prescription-service';

export interface AppDeps {
  store: PrescriptionStore;
  verifier: AppointmentVerifier;
  notifier: NotificationEmitter;
  logger: Logger;
  isProduction?: boolean;
}

export const createApp = ({ store, verifier, notifier, logger, isProduction = false }: AppDeps): Express => {
  const app = express();

  // Trust proxy - Required when behind a reverse proxy for correct client IPs
  app.set('trust proxy', 1);

  app.use(correlation(logger));

  app.use(helmet());

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', CORRELATION_HEADER],
    exposedHeaders: [CORRELATION_HEADER],
    maxAge: 600 // Cache preflight requests for 10 minutes
  }));

  // Request size limits to prevent DoS
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', service: SERVICE_NAME });
  });

  // Routes
  const prescriptionRoutes = createPrescriptionRoutes({ store, verifier, notifier });
  app.use('/prescriptions', prescriptionRoutes);
  app.use('/v1/prescriptions', prescriptionRoutes);

  // 404 handler for unknown routes
  app.use(notFoundHandler);

  // Error handling
  app.use(errorHandler(isProduction));

  return app;
};
