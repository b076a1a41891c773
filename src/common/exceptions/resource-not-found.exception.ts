import { NotFoundException } from '@nestjs/common';

export type ResourceIdentifier = string | number;

/* 
Raised when an entity/identifier pair has no matching row
*/
export class ResourceNotFoundException extends NotFoundException {
  readonly entityName: string;
  readonly identifier: ResourceIdentifier;
  readonly identifierType: string;

  constructor(
    entityName: string,
    identifier: ResourceIdentifier,
    identifierType: string = 'id',
  ) {
    super(
      `Unable to find the ${entityName} with ${identifierType} ${identifier}.`,
    );
    this.entityName = entityName;
    this.identifier = identifier;
    this.identifierType = identifierType;
  }
}
