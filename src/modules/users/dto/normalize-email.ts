import type { TransformFnParams } from 'class-transformer';

// Emails are stored trimmed and lowercased
export const normalizeEmail = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;
