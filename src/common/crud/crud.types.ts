import type { QueryRunner } from 'typeorm';

import type { TraitName } from '../entities/entity-capabilities';

/**
 * One unit of work. Obtained from `DatabaseService.withSession`, never built
 * by the engine.
 */
export type DbSession = QueryRunner;

export type FilterValue = string | number | boolean | Date | null;

/**
 * Equality conditions combined with AND, keyed by property path
 * (`name`, `credentials.email`).
 */
export type Filters = Record<string, FilterValue>;

export interface Pagination {
  skip?: number;
  limit?: number;
}

export interface DeleteOptions {
  soft?: boolean;
}

export interface CrudServiceOptions {
  /** Traits the entity must embed; checked when the service is constructed. */
  requires?: readonly TraitName[];
}
