/**
 * Ledger error taxonomy.
 * Every failure raised by the billing core extends LedgerError and carries a
 * stable `code`; controllers translate codes into HTTP responses.
 */

import type { Money } from './money';

export type LedgerErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_ITEM'
  | 'INVALID_DISCOUNT'
  | 'INVALID_SCHEDULE'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'OVERPAYMENT_REJECTED'
  | 'REFUND_NOT_ELIGIBLE'
  | 'LEDGER_CONTENTION'
  | 'LEDGER_CONFLICT';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  /**
   * Extra fields included in the response body next to `code` and `message`.
   */
  details(): Record<string, unknown> {
    return {};
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, ...this.details() };
  }
}

export class ValidationError extends LedgerError {
  constructor(message: string, code: LedgerErrorCode = 'VALIDATION_ERROR') {
    super(code, message);
  }
}

export class InvalidItemError extends ValidationError {
  readonly position: number;

  constructor(position: number, message: string) {
    super(`Item ${position + 1}: ${message}`, 'INVALID_ITEM');
    this.position = position;
  }

  details(): Record<string, unknown> {
    return { position: this.position };
  }
}

export class InvalidDiscountError extends ValidationError {
  constructor(message: string) {
    super(message, 'INVALID_DISCOUNT');
  }
}

export class InvalidScheduleError extends ValidationError {
  constructor(message: string) {
    super(message, 'INVALID_SCHEDULE');
  }
}

export class NotFoundError extends LedgerError {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} ${id} not found`);
    this.resource = resource;
    this.id = id;
  }

  details(): Record<string, unknown> {
    return { resource: this.resource, id: this.id };
  }
}

export class InvalidTransitionError extends LedgerError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, reason?: string) {
    super('INVALID_TRANSITION', reason ?? `Invalid status transition from ${from} to ${to}`);
    this.from = from;
    this.to = to;
  }

  details(): Record<string, unknown> {
    return { from: this.from, to: this.to };
  }
}

export class OverpaymentRejectedError extends LedgerError {
  readonly requested: Money;
  readonly remaining: Money;

  constructor(requested: Money, remaining: Money, scope: 'invoice' | 'term' = 'invoice') {
    super(
      'OVERPAYMENT_REJECTED',
      `Payment of ${requested.toDecimal()} exceeds the remaining ${scope} balance of ${remaining.toDecimal()}`
    );
    this.requested = requested;
    this.remaining = remaining;
  }

  details(): Record<string, unknown> {
    return { requested: this.requested.toDecimal(), remaining: this.remaining.toDecimal() };
  }
}

export class RefundNotEligibleError extends LedgerError {
  readonly refundable: Money;

  constructor(message: string, refundable: Money) {
    super('REFUND_NOT_ELIGIBLE', message);
    this.refundable = refundable;
  }

  details(): Record<string, unknown> {
    return { refundable: this.refundable.toDecimal() };
  }
}

/**
 * Raised when the retry budget for a contended invoice is exhausted.
 * Callers may retry the whole request later.
 */
export class LedgerContentionError extends LedgerError {
  readonly attempts: number;

  constructor(invoiceId: string, attempts: number) {
    super('LEDGER_CONTENTION', `Invoice ${invoiceId} is being modified concurrently; gave up after ${attempts} attempts`);
    this.attempts = attempts;
  }

  details(): Record<string, unknown> {
    return { attempts: this.attempts };
  }
}

/**
 * Transient write conflict inside a unit of work. Never surfaces to callers:
 * the ledger retries and eventually converts it into LedgerContentionError.
 */
export class LedgerConflictError extends LedgerError {
  constructor(message: string) {
    super('LEDGER_CONFLICT', message);
  }
}

export const isLedgerError = (err: unknown): err is LedgerError => err instanceof LedgerError;

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
