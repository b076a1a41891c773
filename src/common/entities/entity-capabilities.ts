import { getMetadataArgsStorage } from 'typeorm';

import { MissingCapabilityError } from '../exceptions/configuration.error';
import { Credentials } from './credentials.embedded';
import { SoftDelete } from './soft-delete.embedded';
import { Timestamps } from './timestamps.embedded';
import type { Identified } from './base.entity';

export type EntityClass<T extends Identified> = new () => T;

export type IdentityKind = 'increment' | 'uuid';

export type TraitName = 'timestamps' | 'softDelete' | 'credentials';

export interface EmbeddedTrait {
  propertyName: string;
  type: Function;
  fields: ReadonlySet<string>;
}

/**
 * What an entity class can do, read once from its decorator metadata.
 */
export interface EntityCapabilities {
  entityName: string;
  identity: IdentityKind;
  timestamps: boolean;
  softDelete: boolean;
  /** Top-level column property names, `id` included. */
  columns: ReadonlySet<string>;
  /** Embedded field sets, keyed by the property that holds them. */
  embeddeds: ReadonlyMap<string, EmbeddedTrait>;
}

const TRAIT_TYPES: ReadonlyArray<[TraitName, Function]> = [
  ['timestamps', Timestamps],
  ['softDelete', SoftDelete],
  ['credentials', Credentials],
];

function inheritanceTree(target: Function): Function[] {
  const tree: Function[] = [];
  let current: unknown = target;
  while (typeof current === 'function' && current !== Function.prototype) {
    tree.push(current);
    current = Object.getPrototypeOf(current);
  }
  return tree;
}

export function describeEntity<T extends Identified>(
  target: EntityClass<T>,
  requires: readonly TraitName[] = [],
): EntityCapabilities {
  const storage = getMetadataArgsStorage();
  const entityName = target.name;
  const tree = inheritanceTree(target);

  if (!storage.tables.some((table) => table.target === target)) {
    throw new MissingCapabilityError(entityName, 'class is not an @Entity');
  }

  const columns = storage.filterColumns(tree);
  const idColumn = columns.find(
    (column) => column.propertyName === 'id' && column.options.primary,
  );
  const generation = tree
    .map((cls) => storage.findGenerated(cls, 'id'))
    .find((generated) => generated !== undefined);

  if (!idColumn || !generation) {
    throw new MissingCapabilityError(
      entityName,
      "entity must extend IntIdEntity or UuidIdEntity to get a generated 'id'",
    );
  }
  if (generation.strategy !== 'increment' && generation.strategy !== 'uuid') {
    throw new MissingCapabilityError(
      entityName,
      `unsupported identity strategy '${generation.strategy}'`,
    );
  }

  const embeddeds = new Map<string, EmbeddedTrait>();
  for (const embedded of storage.filterEmbeddeds(tree)) {
    const type = embedded.type();
    if (typeof type !== 'function') {
      continue;
    }
    embeddeds.set(embedded.propertyName, {
      propertyName: embedded.propertyName,
      type,
      fields: new Set(
        storage.filterColumns(type).map((column) => column.propertyName),
      ),
    });
  }

  const traits = new Set<TraitName>();
  for (const [name, traitType] of TRAIT_TYPES) {
    const holder = [...embeddeds.values()].find(
      (embedded) => embedded.type === traitType,
    );
    if (!holder) {
      continue;
    }
    if (holder.propertyName !== name) {
      throw new MissingCapabilityError(
        entityName,
        `${traitType.name} must be embedded as '${name}', found '${holder.propertyName}'`,
      );
    }
    traits.add(name);
  }

  for (const name of requires) {
    if (!traits.has(name)) {
      throw new MissingCapabilityError(
        entityName,
        `required trait '${name}' is not embedded`,
      );
    }
  }

  return {
    entityName,
    identity: generation.strategy,
    timestamps: traits.has('timestamps'),
    softDelete: traits.has('softDelete'),
    columns: new Set(columns.map((column) => column.propertyName)),
    embeddeds,
  };
}
