/* 
Startup and programmer errors. These are fatal and never retried.
*/
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedBackendError extends ConfigurationError {
  readonly backend: string;

  constructor(backend: string) {
    super(`Unsupported DB_TYPE: ${backend}`);
    this.name = 'UnsupportedBackendError';
    this.backend = backend;
  }
}

export class MissingCapabilityError extends Error {
  readonly entityName: string;

  constructor(entityName: string, message: string) {
    super(`${entityName}: ${message}`);
    this.name = 'MissingCapabilityError';
    this.entityName = entityName;
  }
}
