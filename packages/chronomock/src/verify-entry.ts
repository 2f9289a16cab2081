/**
 * chronomock/verify
 *
 * Call accounting shared by the mocks, for building mocks of your own.
 */

export {
  CallCounter,
  CallVerifier,
  type CallVerifierOptions,
  type VerifierState,
  type Verifiable,
  createVerificationScope,
  withVerification,
  releasePending,
  pendingCount,
  type ReleaseOptions,
  type VerificationScope,
  type VerificationScopeOptions,
} from "./verify";
