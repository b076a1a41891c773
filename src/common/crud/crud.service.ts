import { Logger } from '@nestjs/common';
import { SelectQueryBuilder, QueryFailedError } from 'typeorm';
import { isUUID, validate } from 'class-validator';

import {
  describeEntity,
  EntityCapabilities,
  EntityClass,
} from '../entities/entity-capabilities';
import { ResourceAlreadyExistsException } from '../exceptions/resource-already-exists.exception';
import { ResourceNotFoundException } from '../exceptions/resource-not-found.exception';
import { InvalidArgumentException } from '../exceptions/invalid-argument.exception';
import { UnknownFieldException } from '../exceptions/unknown-field.exception';
import { isSoftDeletable, SoftDelete } from '../entities/soft-delete.embedded';
import { isTimestamped, Timestamps } from '../entities/timestamps.embedded';
import { collectViolations } from '../validation/validate-input';
import type { Identified } from '../entities/base.entity';
import {
  CrudServiceOptions,
  DbSession,
  DeleteOptions,
  Filters,
  Pagination,
} from './crud.types';

const ALIAS = 'entity';

// Upper bound of a PostgreSQL `integer` identity column
const MAX_INCREMENT_ID = 2147483647;

// PostgreSQL unique_violation, and the SQLite extended result codes
const UNIQUE_VIOLATION_CODES = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

interface FieldAssignment {
  property: string;
  field?: string;
  value: unknown;
}

function isUniqueViolation(error: unknown): error is QueryFailedError {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError)
  ) {
    return false;
  }
  return UNIQUE_VIOLATION_CODES.has(String(driverError.code));
}

function isFieldObject(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Generic CRUD operations for one entity class.
 *
 * The entity's capabilities (identity kind, embedded traits, declared fields)
 * are read from its TypeORM metadata when the service is constructed, so a
 * class that cannot be served fails at setup rather than on first use.
 *
 * Every operation takes the caller's session and never opens or releases one.
 * Mutations run in a transaction on that session (a savepoint when the caller
 * already holds one) and are committed before the method returns.
 *
 * @example
 * ```ts
 * const members = new CrudService<Member, NewMember>(Member);
 * await database.withSession(async (session) => {
 *   const member = await members.create(session, { name: 'Alice', email: 'alice@example.com' });
 *   await members.update(session, member.id, { name: 'Alicia' });
 * });
 * ```
 */
export class CrudService<
  T extends Identified,
  C extends object = Record<string, unknown>,
  U extends object = Partial<C>,
> {
  protected readonly logger = new Logger(this.constructor.name);
  protected readonly capabilities: EntityCapabilities;

  constructor(
    protected readonly entity: EntityClass<T>,
    options: CrudServiceOptions = {},
  ) {
    this.capabilities = describeEntity(entity, options.requires);
  }

  get entityName(): string {
    return this.capabilities.entityName;
  }

  /*
  Fetch by identity. Never resolves to null.
  */
  async get(session: DbSession, id: T['id']): Promise<T> {
    // An id of the wrong shape cannot match a row and would fail as a driver error on postgres
    if (!this.isWellFormedId(id)) {
      throw new ResourceNotFoundException(this.entityName, id);
    }

    const found = await this.query(session)
      .where(`${ALIAS}.id = :id`, { id })
      .getOne();

    if (!found) {
      throw new ResourceNotFoundException(this.entityName, id);
    }

    this.logger.debug(`Loaded ${this.entityName} ${id}`);
    return found;
  }

  /*
  Page through rows in identity order
  */
  async getMulti(
    session: DbSession,
    { skip = 0, limit = 100 }: Pagination = {},
  ): Promise<T[]> {
    if (!Number.isInteger(skip) || skip < 0) {
      throw new InvalidArgumentException(
        'skip',
        'must be a non-negative integer',
      );
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidArgumentException('limit', 'must be a positive integer');
    }

    return this.query(session)
      .orderBy(`${ALIAS}.id`, 'ASC')
      .offset(skip)
      .limit(limit)
      .getMany();
  }

  // Raw row count, soft-deleted rows included
  async count(session: DbSession): Promise<number> {
    return this.query(session).getCount();
  }

  async create(session: DbSession, input: C): Promise<T> {
    const entity = session.manager.create(this.entity);
    this.applyAssignments(entity, this.resolveAssignments(input));

    if (this.capabilities.timestamps) {
      Object.assign(entity, { timestamps: Timestamps.startingAt(new Date()) });
    }
    if (this.capabilities.softDelete && !isSoftDeletable(entity)) {
      Object.assign(entity, { softDelete: new SoftDelete() });
    }

    await this.validateEntity(entity);

    const saved = await this.transactional(session, null, () =>
      session.manager.save(entity),
    );
    this.logger.log(`Created ${this.entityName} ${saved.id}`);

    return this.get(session, saved.id);
  }

  /**
   * Return the first row matching `filters`, or create one from `input`.
   *
   * The lookup and the insert are separate statements, so two concurrent
   * callers can both miss and both insert. Only a unique constraint on the
   * filtered columns closes that window: the losing insert then fails with
   * {@link ResourceAlreadyExistsException} instead of duplicating the row.
   */
  async getOrCreate(
    session: DbSession,
    input: C,
    filters: Filters,
  ): Promise<[T, boolean]> {
    if (Object.keys(filters).length === 0) {
      throw new InvalidArgumentException(
        'filters',
        'at least one filter must be provided for getOrCreate',
      );
    }

    const existing = await this.findFirst(session, filters);
    if (existing) {
      return [existing, false];
    }

    return [await this.create(session, input), true];
  }

  /*
  Apply the fields present in `input`. Every key is checked before any is
  applied, so a rejected update changes nothing.
  */
  async update(session: DbSession, id: T['id'], input: U): Promise<T> {
    const entity = await this.get(session, id);
    const assignments = this.resolveAssignments(input);

    if (assignments.length === 0) {
      throw new InvalidArgumentException(
        'input',
        'no data provided for update',
      );
    }

    this.applyAssignments(entity, assignments);
    if (isTimestamped(entity)) {
      entity.timestamps.touch(new Date());
    }

    await this.validateEntity(entity);
    await this.transactional(session, id, () => session.manager.save(entity));
    this.logger.log(
      `Updated ${this.entityName} ${id}: ${assignments
        .map(({ property, field }) => (field ? `${property}.${field}` : property))
        .join(', ')}`,
    );

    return this.get(session, id);
  }

  async exists(session: DbSession, filters: Filters): Promise<boolean> {
    const matches = await this.filtered(session, filters).getCount();
    return matches > 0;
  }

  /**
   * Soft-delete when asked to and the entity embeds {@link SoftDelete};
   * otherwise remove the row. An absent id fails with
   * {@link ResourceNotFoundException}, so this never resolves to `false`.
   */
  async delete(
    session: DbSession,
    id: T['id'],
    { soft = false }: DeleteOptions = {},
  ): Promise<boolean> {
    const entity = await this.get(session, id);

    if (soft && isSoftDeletable(entity)) {
      const now = new Date();
      entity.softDelete.markDeleted(now);
      if (isTimestamped(entity)) {
        entity.timestamps.touch(now);
      }

      await this.transactional(session, id, () => session.manager.save(entity));
      this.logger.log(`Soft deleted ${this.entityName} ${id}`);
      return true;
    }

    if (soft) {
      this.logger.debug(
        `${this.entityName} has no soft delete trait, removing ${id}`,
      );
    }

    await this.transactional(session, id, () =>
      session.manager.remove(entity),
    );
    this.logger.log(`Deleted ${this.entityName} ${id}`);
    return true;
  }

  protected query(session: DbSession): SelectQueryBuilder<T> {
    return session.manager.createQueryBuilder(this.entity, ALIAS);
  }

  protected filtered(
    session: DbSession,
    filters: Filters,
  ): SelectQueryBuilder<T> {
    const { driver } = session.manager.connection;
    const metadata = session.manager.connection.getMetadata(this.entity);
    const builder = this.query(session);

    Object.entries(filters).forEach(([path, value], index) => {
      const column = metadata.findColumnWithPropertyPath(path);
      if (!column) {
        throw new UnknownFieldException(this.entityName, path);
      }

      const reference = `${driver.escape(ALIAS)}.${driver.escape(column.databaseName)}`;
      if (value === null) {
        builder.andWhere(`${reference} IS NULL`);
      } else {
        const parameter = `filter${index}`;
        builder.andWhere(`${reference} = :${parameter}`, {
          [parameter]: driver.preparePersistentValue(value, column),
        });
      }
    });

    return builder;
  }

  protected async findFirst(
    session: DbSession,
    filters: Filters,
  ): Promise<T | null> {
    return this.filtered(session, filters)
      .orderBy(`${ALIAS}.id`, 'ASC')
      .getOne();
  }

  /*
  Run `work` in its own transaction on the session. A uniqueness violation is
  rolled back and surfaced as ResourceAlreadyExistsException; anything else is
  rolled back and rethrown as is.
  */
  protected async transactional<R>(
    session: DbSession,
    id: T['id'] | null,
    work: () => Promise<R>,
  ): Promise<R> {
    await session.startTransaction();
    try {
      const result = await work();
      await session.commitTransaction();
      return result;
    } catch (error) {
      if (session.isTransactionActive) {
        await session.rollbackTransaction();
      }

      if (isUniqueViolation(error)) {
        this.logger.warn(
          `Uniqueness conflict on ${this.entityName}: ${error.message}`,
        );
        throw new ResourceAlreadyExistsException(
          this.entityName,
          id,
          error.message,
        );
      }
      throw error;
    }
  }

  private isWellFormedId(id: T['id']): boolean {
    if (this.capabilities.identity === 'uuid') {
      return typeof id === 'string' && isUUID(id);
    }
    return (
      typeof id === 'number' &&
      Number.isInteger(id) &&
      id > 0 &&
      id <= MAX_INCREMENT_ID
    );
  }

  private managedFields(): Set<string> {
    const managed = new Set(['id']);
    if (this.capabilities.timestamps) managed.add('timestamps');
    if (this.capabilities.softDelete) managed.add('softDelete');
    return managed;
  }

  private resolveAssignments(input: object): FieldAssignment[] {
    const managed = this.managedFields();
    const assignments: FieldAssignment[] = [];

    for (const [property, value] of Object.entries(input)) {
      if (value === undefined) {
        continue;
      }
      if (managed.has(property)) {
        throw new InvalidArgumentException(
          property,
          `is managed by ${this.entityName} itself and cannot be set`,
        );
      }

      const embedded = this.capabilities.embeddeds.get(property);
      if (embedded) {
        if (!isFieldObject(value)) {
          throw new InvalidArgumentException(
            property,
            'must be an object of embedded fields',
          );
        }
        for (const [field, nested] of Object.entries(value)) {
          if (nested === undefined) {
            continue;
          }
          if (!embedded.fields.has(field)) {
            throw new UnknownFieldException(
              this.entityName,
              `${property}.${field}`,
            );
          }
          assignments.push({ property, field, value: nested });
        }
        continue;
      }

      if (!this.capabilities.columns.has(property)) {
        throw new UnknownFieldException(this.entityName, property);
      }
      assignments.push({ property, value });
    }

    return assignments;
  }

  private applyAssignments(entity: T, assignments: FieldAssignment[]): void {
    for (const { property, field, value } of assignments) {
      if (field === undefined) {
        Reflect.set(entity, property, value);
        continue;
      }

      let holder: unknown = Reflect.get(entity, property);
      const embedded = this.capabilities.embeddeds.get(property);
      if ((typeof holder !== 'object' || holder === null) && embedded) {
        const created: object = Reflect.construct(embedded.type, []);
        Reflect.set(entity, property, created);
        holder = created;
      }
      if (typeof holder === 'object' && holder !== null) {
        Reflect.set(holder, field, value);
      }
    }
  }

  private async validateEntity(entity: T): Promise<void> {
    const errors = await validate(entity, { forbidUnknownValues: false });
    if (errors.length > 0) {
      throw new InvalidArgumentException(
        'input',
        collectViolations(errors).join('; '),
      );
    }
  }
}
