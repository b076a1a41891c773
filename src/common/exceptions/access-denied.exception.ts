import { ForbiddenException } from '@nestjs/common';

// Produced by callers of the CRUD layer, never by the engine itself
export class AccessDeniedException extends ForbiddenException {
  readonly detail: string;

  constructor(
    detail: string = 'Access denied due to insufficient permissions.',
  ) {
    super(detail);
    this.detail = detail;
  }
}
