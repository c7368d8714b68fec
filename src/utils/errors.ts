export type DistributionErrorCode =
  | 'TreeFull'
  | 'ProofInvalid'
  | 'InvalidCategory'
  | 'AlreadySubmitted'
  | 'BatchTooLarge'
  | 'EmptyBatch'
  | 'LengthMismatch'
  | 'DuplicateUser'
  | 'CapExceeded'
  | 'DeadlineExpired'
  | 'InvalidSignature'
  | 'NonceReplay'
  | 'RootMismatch'
  | 'NoDistribution'
  | 'AlreadyClaimed'
  | 'Unauthorized';

// Failures that can never succeed again for the same key
const TERMINAL_CODES: ReadonlySet<DistributionErrorCode> = new Set([
  'TreeFull',
  'AlreadySubmitted',
  'AlreadyClaimed',
]);

export class DistributionError extends Error {
  readonly code: DistributionErrorCode;

  constructor(code: DistributionErrorCode, message?: string) {
    super(message ? `${code}: ${message}` : code);
    this.name = 'DistributionError';
    this.code = code;
  }

  get terminal(): boolean {
    return TERMINAL_CODES.has(this.code);
  }
}

export function isDistributionError(
  error: unknown,
  code?: DistributionErrorCode
): error is DistributionError {
  if (!(error instanceof DistributionError)) return false;
  return code === undefined || error.code === code;
}
