import { isRegisterError, type RegisterError } from '../../src/errors/register-error.js';

/**
 * Run `fn` and return the RegisterError it throws.
 */
export function captureRegisterError(fn: () => unknown): RegisterError {
  try {
    fn();
  } catch (error) {
    if (isRegisterError(error)) return error;
    throw error;
  }
  throw new Error('expected a RegisterError to be thrown');
}
