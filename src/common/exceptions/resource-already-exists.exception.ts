import { ConflictException } from '@nestjs/common';

import type { ResourceIdentifier } from './resource-not-found.exception';

/* 
Raised when storage reports a uniqueness violation
*/
export class ResourceAlreadyExistsException extends ConflictException {
  readonly entityName: string;
  readonly identifier: ResourceIdentifier | null;
  readonly detail: string | null;

  constructor(
    entityName: string,
    identifier: ResourceIdentifier | null = null,
    detail: string | null = null,
  ) {
    super(
      identifier === null
        ? `A ${entityName} with the same unique fields already exists.`
        : `The ${entityName} ${identifier} already exists.`,
    );
    this.entityName = entityName;
    this.identifier = identifier;
    this.detail = detail;
  }
}
