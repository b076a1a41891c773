import { IsNotEmpty, IsString, MaxLength, ValidateNested } from 'class-validator';
import { Column, Entity } from 'typeorm';

import { Credentials, HasCredentials } from '../../../common/entities/credentials.embedded';
import { SoftDelete, SoftDeletable } from '../../../common/entities/soft-delete.embedded';
import { Timestamps, Timestamped } from '../../../common/entities/timestamps.embedded';
import { UuidIdEntity } from '../../../common/entities/base.entity';

/* 
User Entity - user accounts built from the credentials, timestamps and soft delete traits
*/
@Entity('users')
export class User
  extends UuidIdEntity
  implements HasCredentials, Timestamped, SoftDeletable
{
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @ValidateNested()
  @Column(() => Credentials, { prefix: false })
  credentials!: Credentials;

  @Column(() => Timestamps, { prefix: false })
  timestamps!: Timestamps;

  @Column(() => SoftDelete, { prefix: false })
  softDelete!: SoftDelete;
}
