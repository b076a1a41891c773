import { Column } from 'typeorm';

import { TIMESTAMP_COLUMN_TYPE } from './column-types';

/* 
Timestamps trait - embed as `timestamps` with `prefix: false`
*/
export class Timestamps {
  @Column({ name: 'created_at', type: TIMESTAMP_COLUMN_TYPE })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: TIMESTAMP_COLUMN_TYPE })
  updatedAt!: Date;

  static startingAt(now: Date): Timestamps {
    const timestamps = new Timestamps();
    timestamps.createdAt = now;
    timestamps.updatedAt = now;
    return timestamps;
  }

  /* 
  Record a mutation. updatedAt is strictly increasing even when the clock
  has not moved past the previous value.
  */
  touch(now: Date): void {
    const previous = this.updatedAt ? this.updatedAt.getTime() : 0;
    this.updatedAt =
      now.getTime() > previous ? now : new Date(previous + 1);
  }
}

export interface Timestamped {
  timestamps: Timestamps;
}

export function isTimestamped(entity: object): entity is Timestamped {
  return 'timestamps' in entity && entity.timestamps instanceof Timestamps;
}
