import { DataSource } from 'typeorm';
import type { Config } from './config';
import { Prescription } from './models/Prescription';

export const entities = [Prescription];

export const createDataSource = (config: Config): DataSource =>
  new DataSource({
    type: 'postgres',
    url: config.database.url,
    synchronize: config.isDev, // Auto-sync in dev only
    logging: config.isDev,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
    entities,
    subscribers: [],
  });
