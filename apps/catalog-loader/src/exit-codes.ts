import { ConfigError } from '@app/config';

import {
  BatchFailure,
  ConnectionError,
  InputUnreadable,
  NoInputFiles,
  SchemaPermissionError,
} from './ingest/errors.js';

export const EXIT_CODES = {
  OK: 0,
  INPUT_ERROR: 2,
  DATABASE_ERROR: 3,
  UNEXPECTED: 4,
  INTERRUPTED: 130,
} as const;

type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (
    error instanceof ConfigError ||
    error instanceof NoInputFiles ||
    error instanceof InputUnreadable
  ) {
    return EXIT_CODES.INPUT_ERROR;
  }
  if (
    error instanceof ConnectionError ||
    error instanceof SchemaPermissionError ||
    error instanceof BatchFailure
  ) {
    return EXIT_CODES.DATABASE_ERROR;
  }
  return EXIT_CODES.UNEXPECTED;
}
