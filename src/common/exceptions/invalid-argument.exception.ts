import { BadRequestException } from '@nestjs/common';

/* 
Malformed pagination bounds, empty filter/update sets, failed validation
*/
export class InvalidArgumentException extends BadRequestException {
  readonly argument: string;
  readonly reason: string;

  constructor(argument: string, reason: string) {
    super(`Invalid ${argument}: ${reason}`);
    this.argument = argument;
    this.reason = reason;
  }
}
