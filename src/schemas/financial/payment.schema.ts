/**
 * Payment Validation Schemas
 */

import * as Joi from 'joi';
import { ApplyPaymentDto, PAYMENT_METHODS, RefundPaymentDto } from '../../models/financial/payment.model';
import { decimalValue } from './invoice.schema';

export const paymentIdSchema = Joi.string().guid().required();

/**
 * Schema for recording a payment against an invoice, optionally against one
 * of its terms.
 *
 * @example
 * const { error, value } = applyPaymentSchema.validate(req.body, { abortEarly: false });
 */
export const applyPaymentSchema = Joi.object<ApplyPaymentDto>({
  invoice_id: Joi.string().guid().required(),
  invoice_term_id: Joi.string().guid().allow(null).optional(),
  amount: decimalValue(2).required(),
  payment_method: Joi.string().valid(...PAYMENT_METHODS).required(),
  reference_number: Joi.string().max(100).allow(null).optional(),
  payment_date: Joi.date().iso().optional(),
  notes: Joi.string().max(2000).allow('', null).optional(),
});

export type RefundBody = Omit<RefundPaymentDto, 'payment_id'>;

// payment_id comes from the route
export const refundPaymentSchema = Joi.object<RefundBody>({
  refund_amount: decimalValue(2).required(),
  reason: Joi.string().trim().min(1).max(500).required(),
  refund_date: Joi.date().iso().optional(),
});

export interface PaymentStatisticsQuery {
  from?: Date;
  to?: Date;
}

export const paymentStatisticsQuerySchema = Joi.object<PaymentStatisticsQuery>({
  from: Joi.date().iso().optional(),
  to: Joi.date().iso().optional(),
});

export interface PaymentTrendsQuery {
  days: number;
}

export const paymentTrendsQuerySchema = Joi.object<PaymentTrendsQuery>({
  days: Joi.number().integer().min(1).max(366).default(30),
});
