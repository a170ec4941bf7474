export class ServiceError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
  }
}

export function notFound(code: string, message: string): ServiceError {
  return new ServiceError(404, code, message);
}

export function badRequest(
  code: string,
  message: string,
  details?: unknown
): ServiceError {
  return new ServiceError(400, code, message, details);
}

export function conflict(code: string, message: string): ServiceError {
  return new ServiceError(409, code, message);
}

export function unauthorized(code: string, message: string): ServiceError {
  return new ServiceError(401, code, message);
}

export const LedgerErrorKind = {
  NotAuthorized: 'NOT_AUTHORIZED',
  PolicyExists: 'POLICY_EXISTS',
  PolicyNotFound: 'POLICY_NOT_FOUND',
  // Reserved: no current transition raises it.
  InsufficientPremium: 'INSUFFICIENT_PREMIUM',
  PolicyExpired: 'POLICY_EXPIRED',
  InvalidClaim: 'INVALID_CLAIM',
  ClaimAlreadyProcessed: 'CLAIM_ALREADY_PROCESSED',
  InvalidCoverage: 'INVALID_COVERAGE',
  InvalidPremium: 'INVALID_PREMIUM',
  InvalidDuration: 'INVALID_DURATION',
  TransferFailed: 'TRANSFER_FAILED'
} as const;

export type LedgerErrorKind = (typeof LedgerErrorKind)[keyof typeof LedgerErrorKind];

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  NOT_AUTHORIZED: 403,
  POLICY_EXISTS: 409,
  POLICY_NOT_FOUND: 404,
  INSUFFICIENT_PREMIUM: 402,
  POLICY_EXPIRED: 422,
  INVALID_CLAIM: 400,
  CLAIM_ALREADY_PROCESSED: 409,
  INVALID_COVERAGE: 400,
  INVALID_PREMIUM: 400,
  INVALID_DURATION: 400,
  TRANSFER_FAILED: 402
};

export class LedgerError extends ServiceError {
  constructor(
    public readonly kind: LedgerErrorKind,
    message: string,
    details?: unknown
  ) {
    super(STATUS_BY_KIND[kind], kind, message, details);
  }
}

export function ledgerError(
  kind: LedgerErrorKind,
  message: string,
  details?: unknown
): LedgerError {
  return new LedgerError(kind, message, details);
}

export function isLedgerError(
  error: unknown,
  kind?: LedgerErrorKind
): error is LedgerError {
  return error instanceof LedgerError && (kind === undefined || error.kind === kind);
}
