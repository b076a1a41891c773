import { Column, Entity, PrimaryColumn } from 'typeorm';

import { MissingCapabilityError } from '../../src/common/exceptions/configuration.error';
import { describeEntity } from '../../src/common/entities/entity-capabilities';
import { Timestamps } from '../../src/common/entities/timestamps.embedded';
import { IntIdEntity } from '../../src/common/entities/base.entity';
import { User } from '../../src/modules/users/entities/user.entity';
import { Member, Product, Tag } from '../fixtures/entities';

class NotAnEntity extends IntIdEntity {
  name!: string;
}

@Entity('natural_keys')
class NaturalKey {
  @PrimaryColumn({ type: 'varchar' })
  id!: string;
}

@Entity('misnamed')
class Misnamed extends IntIdEntity {
  @Column(() => Timestamps, { prefix: false })
  stamps!: Timestamps;
}

describe('describeEntity', () => {
  it('should read identity, columns and traits of an integer-id entity', () => {
    const capabilities = describeEntity(Member);

    expect(capabilities.entityName).toBe('Member');
    expect(capabilities.identity).toBe('increment');
    expect(capabilities.timestamps).toBe(true);
    expect(capabilities.softDelete).toBe(false);
    expect(capabilities.embeddeds.has('credentials')).toBe(false);
    expect([...capabilities.columns].sort()).toEqual([
      'email',
      'id',
      'isActive',
      'name',
    ]);
    expect([...capabilities.embeddeds.keys()]).toEqual(['timestamps']);
  });

  it('should list the fields of each embedded trait', () => {
    const capabilities = describeEntity(Product);

    expect(capabilities.softDelete).toBe(true);
    expect([
      ...(capabilities.embeddeds.get('softDelete')?.fields ?? []),
    ].sort()).toEqual(['deletedAt', 'isDeleted']);
  });

  it('should recognise uuid identity without traits', () => {
    const capabilities = describeEntity(Tag);

    expect(capabilities.identity).toBe('uuid');
    expect(capabilities.timestamps).toBe(false);
    expect(capabilities.embeddeds.size).toBe(0);
  });

  it('should accept every trait a user embeds', () => {
    const capabilities = describeEntity(User, [
      'credentials',
      'timestamps',
      'softDelete',
    ]);

    expect(capabilities.identity).toBe('uuid');
    expect(capabilities.embeddeds.get('credentials')?.fields).toEqual(
      new Set(['email', 'hashedPassword', 'isActive']),
    );
  });

  it('should reject a class that is not an entity', () => {
    expect(() => describeEntity(NotAnEntity)).toThrow(
      new MissingCapabilityError('NotAnEntity', 'class is not an @Entity'),
    );
  });

  it('should reject an entity without a generated id', () => {
    expect(() => describeEntity(NaturalKey)).toThrow(
      "NaturalKey: entity must extend IntIdEntity or UuidIdEntity to get a generated 'id'",
    );
  });

  it('should reject a trait embedded under another name', () => {
    expect(() => describeEntity(Misnamed)).toThrow(
      "Misnamed: Timestamps must be embedded as 'timestamps', found 'stamps'",
    );
  });

  it('should reject a missing required trait', () => {
    expect(() => describeEntity(Member, ['softDelete'])).toThrow(
      "Member: required trait 'softDelete' is not embedded",
    );
  });
});
