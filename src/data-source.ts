import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { buildDataSourceOptions } from './config/database.config';
import { validateEnvironment } from './config/env.validation';

// Entry point for the TypeORM CLI (migration:run / migration:revert)
const env = validateEnvironment(process.env);

export default new DataSource(
  buildDataSourceOptions({
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    database: env.DB_NAME,
    ssl: env.DB_SSL === 'true',
    logging: true,
  }),
);
