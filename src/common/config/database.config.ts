import { ConfigService } from '@nestjs/config';
import { DataSourceOptions } from 'typeorm';

import {
  ConfigurationError,
  UnsupportedBackendError,
} from '../exceptions/configuration.error';
import { ENTITY_COLUMNS_BACKEND } from '../entities/column-types';

export type BackendKind = 'sqlite' | 'postgres';

export type Environment = 'development' | 'production';

export interface DatabaseSettings {
  environment: Environment;
  backend: string;
  name: string;
  user: string;
  password: string;
  host: string;
  port: number;
  connectionUri?: string;
  synchronize: boolean;
  poolSize: number;
  workerCount: number;
  maxOverflow: number;
  poolTimeout: number;
}

// Lower bound for the per-worker pool, whatever the budget says
export const MIN_POOL_SIZE = 5;

const SQLITE_BUSY_TIMEOUT_MS = 5000;
const IDLE_TIMEOUT_MS = 30000;
const SQLITE_URI_PREFIX = 'sqlite://';

function isBackendKind(value: string): value is BackendKind {
  return value === 'sqlite' || value === 'postgres';
}

export const readDatabaseSettings = (
  configService: ConfigService,
): DatabaseSettings => ({
  environment:
    configService.get<string>('ENVIRONMENT', 'development') === 'production'
      ? 'production'
      : 'development',
  backend: configService.get<string>('DB_TYPE', 'sqlite'),
  name: configService.get<string>('DB_NAME', 'app.db'),
  user: configService.get<string>('DB_USER', 'user'),
  password: configService.get<string>('DB_PASSWORD', 'changeme'),
  host: configService.get<string>('DB_HOST', 'localhost'),
  port: configService.get<number>('DB_PORT', 5432),
  connectionUri: configService.get<string>('DATABASE_URL'),
  synchronize: configService.get<boolean>('DB_SYNC', false),
  poolSize: configService.get<number>('DB_POOL_SIZE', 83),
  workerCount: configService.get<number>('WEB_CONCURRENCY', 9),
  maxOverflow: configService.get<number>('DB_MAX_OVERFLOW', 64),
  poolTimeout: configService.get<number>('DB_POOL_TIMEOUT', 30000),
});

/*
Split the configured pool budget across workers
*/
export const resolvePoolSize = (
  configuredPoolSize: number,
  workerCount: number,
): number =>
  Math.max(
    Math.floor(configuredPoolSize / Math.max(workerCount, 1)),
    MIN_POOL_SIZE,
  );

export const buildConnectionUri = (settings: DatabaseSettings): string => {
  if (settings.connectionUri) {
    return settings.connectionUri;
  }

  switch (settings.backend) {
    case 'postgres': {
      const user = encodeURIComponent(settings.user);
      const password = encodeURIComponent(settings.password);
      return `postgres://${user}:${password}@${settings.host}:${settings.port}/${settings.name}`;
    }
    case 'sqlite':
      return `${SQLITE_URI_PREFIX}${settings.name}`;
    default:
      throw new UnsupportedBackendError(settings.backend);
  }
};

export const sqlitePathFromUri = (uri: string): string => {
  if (!uri.startsWith(SQLITE_URI_PREFIX)) {
    throw new ConfigurationError(
      `DATABASE_URL for sqlite must start with ${SQLITE_URI_PREFIX}`,
    );
  }
  return uri.slice(SQLITE_URI_PREFIX.length);
};

export const buildDataSourceOptions = (
  settings: DatabaseSettings,
): DataSourceOptions => {
  if (!isBackendKind(settings.backend)) {
    throw new UnsupportedBackendError(settings.backend);
  }

  const uri = buildConnectionUri(settings);
  const logging = settings.environment === 'development';

  if (settings.backend === 'sqlite') {
    // Single file, single writer: WAL plus a busy timeout instead of a pool
    return {
      type: 'better-sqlite3',
      database: sqlitePathFromUri(uri),
      synchronize: settings.synchronize,
      logging,
      timeout: SQLITE_BUSY_TIMEOUT_MS,
      prepareDatabase: (db) => {
        db.pragma('journal_mode = WAL');
      },
    };
  }

  const poolSize = resolvePoolSize(settings.poolSize, settings.workerCount);

  return {
    type: 'postgres',
    url: uri,
    synchronize: settings.synchronize,
    logging,

    // Connection pool: poolSize kept warm, maxOverflow more on demand
    extra: {
      min: poolSize,
      max: poolSize + settings.maxOverflow,
      idleTimeoutMillis: IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: settings.poolTimeout,
    },
  };
};

/*
Entity column types are fixed when the entities load; the configured backend must agree
*/
export const assertColumnsBackend = (backend: string): void => {
  if (backend !== ENTITY_COLUMNS_BACKEND) {
    throw new ConfigurationError(
      `DB_TYPE is '${backend}' but entity columns were declared for '${ENTITY_COLUMNS_BACKEND}'. ` +
        'Set DB_TYPE in the process environment before the entities are imported.',
    );
  }
};

export const getDatabaseConfig = (
  configService: ConfigService,
): DataSourceOptions => {
  const settings = readDatabaseSettings(configService);
  const options = buildDataSourceOptions(settings);
  assertColumnsBackend(settings.backend);
  return options;
};
