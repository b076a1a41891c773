import { Column, Index } from 'typeorm';

import { TIMESTAMP_COLUMN_TYPE } from './column-types';

/* 
Soft delete trait - embed as `softDelete` with `prefix: false`.
isDeleted is true iff deletedAt is set.
*/
export class SoftDelete {
  @Index()
  @Column({ name: 'is_deleted', type: 'boolean', default: false })
  isDeleted: boolean = false;

  @Column({ name: 'deleted_at', type: TIMESTAMP_COLUMN_TYPE, nullable: true })
  deletedAt: Date | null = null;

  markDeleted(at: Date): void {
    this.isDeleted = true;
    this.deletedAt = at;
  }

  restore(): void {
    this.isDeleted = false;
    this.deletedAt = null;
  }
}

export interface SoftDeletable {
  softDelete: SoftDelete;
}

export function isSoftDeletable(entity: object): entity is SoftDeletable {
  return 'softDelete' in entity && entity.softDelete instanceof SoftDelete;
}
