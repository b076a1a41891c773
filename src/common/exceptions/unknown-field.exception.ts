import { BadRequestException } from '@nestjs/common';

export class UnknownFieldException extends BadRequestException {
  readonly entityName: string;
  readonly field: string;

  constructor(entityName: string, field: string) {
    super(`${entityName} does not have a field named '${field}'`);
    this.entityName = entityName;
    this.field = field;
  }
}
