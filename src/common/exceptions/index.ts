export * from './resource-already-exists.exception';
export * from './resource-not-found.exception';
export * from './content-no-change.exception';
export * from './invalid-argument.exception';
export * from './unknown-field.exception';
export * from './access-denied.exception';
export * from './configuration.error';
