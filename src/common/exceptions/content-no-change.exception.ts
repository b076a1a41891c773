import { BadRequestException } from '@nestjs/common';

/* 
Raised by callers that detect an update which would not change anything
*/
export class ContentNoChangeException extends BadRequestException {
  readonly detail: string;

  constructor(detail: string = 'No changes detected in the content update.') {
    super(detail);
    this.detail = detail;
  }
}
