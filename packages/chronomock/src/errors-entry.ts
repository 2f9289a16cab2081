/**
 * chronomock/errors entry point
 */
export {
  // Result error objects
  type CallCountMismatch,
  type SpawnError,
  type SpawnBusyError,
  // Thrown errors
  VerificationError,
  CounterOverflowError,
  VerifierConsumedError,
  SpawnTokenConsumedError,
  // Type guards
  isCallCountMismatch,
  isSpawnError,
  isVerificationError,
} from "./errors";
