import { DisasmError, isDisasmError } from '../../src/disasm/errors';

// Runs fn and returns the DisasmError it throws; anything else fails the test.
export function catchDisasmError(fn: () => unknown): DisasmError {
  try {
    fn();
  } catch (e) {
    if (isDisasmError(e)) return e;
    throw e;
  }
  throw new Error('expected a DisasmError to be thrown');
}
