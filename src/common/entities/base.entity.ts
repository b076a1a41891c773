import { PrimaryGeneratedColumn } from 'typeorm';

export type EntityId = number | string;

export interface Identified {
  id: EntityId;
}

// Identity is the only inherited part of an entity; an entity extends exactly one of these
export abstract class IntIdEntity implements Identified {
  @PrimaryGeneratedColumn('increment')
  id!: number;
}

export abstract class UuidIdEntity implements Identified {
  @PrimaryGeneratedColumn('uuid')
  id!: string;
}
