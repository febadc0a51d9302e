import type { DomainError } from '../errors/domain.error';
import type { StorageResult } from '../storage/storage.backend';

export function unwrap<T>(result: StorageResult<T>): T {
  if (!result.success) throw result.error;
  return result.value;
}

export function unwrapError<T>(result: StorageResult<T>): DomainError {
  if (result.success) throw new Error('Expected a failed storage result');
  return result.error;
}

export function silenceConsole() {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
