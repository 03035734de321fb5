import { SshConfigError } from '../lib/errors.js';

export const isSshConfigError = (error: unknown): error is SshConfigError => error instanceof SshConfigError;

/**
 * True for a Node filesystem error reporting a missing path.
 */
export const isMissingFileError = (error: unknown): boolean => {
  if (!error || typeof error !== 'object') return false;
  return 'code' in error && error.code === 'ENOENT';
};

/**
 * One-line description of an error for terminal output.
 */
export const formatErrorMessage = (error: unknown): string => {
  if (isSshConfigError(error)) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
