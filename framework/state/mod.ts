/**
 * Shared application state behind an exclusive lock.
 */

export {
  PoisonedStateError,
  SharedState,
  StateGuardReleasedError,
  type LockCallback,
  type StateGuard,
} from './shared_state.ts';
