import type { MarketplaceErrorCode, MarketplaceFailure } from './types.js';

/**
 * Domain failure raised inside a store transaction.
 * The facade turns it into a failed OperationResult after rollback.
 */
export class MarketplaceError extends Error {
  readonly code: MarketplaceErrorCode;

  constructor(code: MarketplaceErrorCode, message: string) {
    super(message);
    this.name = 'MarketplaceError';
    this.code = code;
  }

  toFailure(): MarketplaceFailure {
    return { code: this.code, message: this.message };
  }
}

export function notFound(message: string): MarketplaceError {
  return new MarketplaceError('NotFound', message);
}

export function notAuthorized(message: string): MarketplaceError {
  return new MarketplaceError('NotAuthorized', message);
}

export function invalidParameters(message: string): MarketplaceError {
  return new MarketplaceError('InvalidParameters', message);
}

export function insufficientFunds(message: string): MarketplaceError {
  return new MarketplaceError('InsufficientFunds', message);
}

export function paymentFailed(message: string): MarketplaceError {
  return new MarketplaceError('PaymentFailed', message);
}
