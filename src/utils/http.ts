import { Response } from 'express';
import * as Joi from 'joi';
import { LedgerErrorCode, isLedgerError } from './errors';

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  VALIDATION_ERROR: 422,
  INVALID_ITEM: 422,
  INVALID_DISCOUNT: 422,
  INVALID_SCHEDULE: 422,
  INVALID_TRANSITION: 422,
  OVERPAYMENT_REJECTED: 422,
  REFUND_NOT_ELIGIBLE: 422,
  NOT_FOUND: 404,
  LEDGER_CONTENTION: 409,
  LEDGER_CONFLICT: 409,
};

export const statusForError = (code: LedgerErrorCode): number => STATUS_BY_CODE[code];

/**
 * Validates request input against a Joi schema.
 * Answers 400 and returns null when the input is malformed.
 *
 * @example
 * const body = validateRequest(createInvoiceSchema, req.body, res);
 * if (!body) return;
 */
export function validateRequest<T>(schema: Joi.Schema<T>, input: unknown, res: Response): T | null {
  const { error, value } = schema.validate(input ?? {}, { abortEarly: false });
  if (error) {
    const details = error.details.map((detail) => detail.message).join(', ');
    res.status(400).json({ message: 'Validation failed', details });
    return null;
  }
  return value;
}

/**
 * Sends a ledger error with its mapped status, or a 500 for anything else.
 */
export function sendLedgerError(res: Response, err: unknown, context: string): void {
  if (isLedgerError(err)) {
    res.status(statusForError(err.code)).json(err.toJSON());
    return;
  }
  console.error(`${context} error:`, err);
  res.status(500).json({ message: 'Internal server error' });
}
