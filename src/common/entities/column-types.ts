import type { ColumnType } from 'typeorm';

import type { BackendKind } from '../config/database.config';

// Decorators are evaluated at import time, so the backend is read from the process environment
export const ENTITY_COLUMNS_BACKEND: BackendKind =
  process.env.DB_TYPE === 'postgres' ? 'postgres' : 'sqlite';

export const TIMESTAMP_COLUMN_TYPE: ColumnType =
  ENTITY_COLUMNS_BACKEND === 'postgres' ? 'timestamp with time zone' : 'datetime';
