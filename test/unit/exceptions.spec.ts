import { HttpStatus } from '@nestjs/common';

import {
  AccessDeniedException,
  ConfigurationError,
  ContentNoChangeException,
  InvalidArgumentException,
  MissingCapabilityError,
  ResourceAlreadyExistsException,
  ResourceNotFoundException,
  UnknownFieldException,
  UnsupportedBackendError,
} from '../../src/common/exceptions';

describe('Exceptions', () => {
  it('should describe a missing resource by its identifier', () => {
    const error = new ResourceNotFoundException('User', 'alice@example.com', 'email');

    expect(error.getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(error.message).toBe(
      'Unable to find the User with email alice@example.com.',
    );
    expect(error.identifierType).toBe('email');
  });

  it('should default the identifier type to id', () => {
    expect(new ResourceNotFoundException('Member', 3).message).toBe(
      'Unable to find the Member with id 3.',
    );
  });

  it('should word a conflict with and without an identifier', () => {
    const known = new ResourceAlreadyExistsException('Member', 2);
    const unknown = new ResourceAlreadyExistsException(
      'Member',
      null,
      'UNIQUE constraint failed: members.email',
    );

    expect(known.getStatus()).toBe(HttpStatus.CONFLICT);
    expect(known.message).toBe('The Member 2 already exists.');
    expect(unknown.message).toBe(
      'A Member with the same unique fields already exists.',
    );
    expect(unknown.detail).toBe('UNIQUE constraint failed: members.email');
  });

  it('should carry default and custom details for caller errors', () => {
    expect(new AccessDeniedException().getStatus()).toBe(HttpStatus.FORBIDDEN);
    expect(new AccessDeniedException().message).toBe(
      'Access denied due to insufficient permissions.',
    );
    expect(new ContentNoChangeException().getStatus()).toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(new ContentNoChangeException('Same name').detail).toBe('Same name');
  });

  it('should name the offending argument or field', () => {
    const invalid = new InvalidArgumentException('limit', 'must be a positive integer');
    const unknown = new UnknownFieldException('Member', 'nickname');

    expect(invalid.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(invalid.message).toBe('Invalid limit: must be a positive integer');
    expect(unknown.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(unknown.message).toBe("Member does not have a field named 'nickname'");
  });

  it('should keep startup errors outside the HTTP hierarchy', () => {
    const unsupported = new UnsupportedBackendError('mysql');

    expect(unsupported).toBeInstanceOf(ConfigurationError);
    expect(unsupported.name).toBe('UnsupportedBackendError');
    expect(unsupported.backend).toBe('mysql');
    expect(new MissingCapabilityError('Tag', 'no id').message).toBe('Tag: no id');
  });
});
