import 'reflect-metadata';
import type { Server } from 'http';
import express, { Express } from 'express';
import { DataSource, getMetadataArgsStorage } from 'typeorm';
import { entities } from '../database';
import { createLogger } from '../logger';

export const silentLogger = createLogger({ level: 'silent' });

/**
 * In-memory SQLite stand-in for the Postgres data source
 */
export const createTestDataSource = async (): Promise<DataSource> => {
  // SQLite has no timestamptz; only the stand-in gets a zone-less column
  for (const column of getMetadataArgsStorage().columns) {
    if (column.options.type === 'timestamptz') {
      column.options.type = 'datetime';
    }
  }

  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities,
    synchronize: true,
    logging: false,
  });
  await dataSource.initialize();
  return dataSource;
};

export interface RunningServer {
  url: string;
  close(): Promise<void>;
}

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => (error ? reject(error) : resolve()));
  });

/**
 * Start an Express app on an ephemeral loopback port
 */
export const startServer = (app: Express): Promise<RunningServer> =>
  new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1');

    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}`,
        close: () => closeServer(server),
      });
    });
  });

/**
 * Base URL of a port nothing listens on
 */
export const unreachableUrl = async (): Promise<string> => {
  const server = await startServer(express());
  await server.close();
  return server.url;
};

export interface StubAppointment {
  appointment_id?: number;
  status: string;
  patient_id: number;
  doctor_id: number;
  [key: string]: unknown;
}

export interface AppointmentStub extends RunningServer {
  appointments: Map<number, StubAppointment>;
  requestedIds: number[];
}

/**
 * In-process stand-in for the appointment service
 */
export const startAppointmentStub = async (): Promise<AppointmentStub> => {
  const appointments = new Map<number, StubAppointment>();
  const requestedIds: number[] = [];

  const app = express();
  app.get('/appointments/:id', (req, res) => {
    const id = Number(req.params.id);
    requestedIds.push(id);

    const appointment = appointments.get(id);
    if (!appointment) {
      res.status(404).json({ detail: 'Appointment not found' });
      return;
    }
    res.json({ appointment_id: id, ...appointment });
  });

  const server = await startServer(app);
  return { ...server, appointments, requestedIds };
};

export interface NotificationStub extends RunningServer {
  received: Array<{ event_type: unknown; data: unknown }>;
}

export type NotificationBehaviour = 'accept' | 'fail' | 'hang';

/**
 * In-process stand-in for the notification service
 */
export const startNotificationStub = async (behaviour: NotificationBehaviour): Promise<NotificationStub> => {
  const received: NotificationStub['received'] = [];

  const app = express();
  app.use(express.json());
  app.post('/notifications', (req, res) => {
    received.push({ event_type: req.body.event_type, data: req.body.data });

    if (behaviour === 'accept') {
      res.status(202).json({ status: 'queued' });
    } else if (behaviour === 'fail') {
      res.status(500).json({ detail: 'Notification backend down' });
    }
    // 'hang' never answers
  });

  const server = await startServer(app);
  return { ...server, received };
};

export const waitFor = async (condition: () => boolean, timeoutMs = 2000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
};
