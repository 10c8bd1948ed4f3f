/**
 * Invoice Validation Schemas
 * Provides Joi validation schemas for invoice-related requests.
 * Checks request shape and formats; amounts stay decimal strings or numbers
 * and are range-checked again by the calculator.
 */

import * as Joi from 'joi';
import {
  CreateInvoiceDto,
  INVOICE_STATUSES,
  InvoiceListFilter,
  InvoiceTermInput,
  UpdateInvoiceDto,
} from '../../models/financial/invoice.model';

/** Decimal with up to `places` fractional digits, optionally negative. */
export const decimalString = (places: number): Joi.StringSchema =>
  Joi.string().pattern(new RegExp(`^-?\\d+(\\.\\d{1,${places}})?$`), `decimal with up to ${places} places`);

/**
 * Amount given as a JSON number or a decimal string.
 * Strings are tried first so that they are not converted to floats.
 */
export const decimalValue = (places: number): Joi.AlternativesSchema =>
  Joi.alternatives().try(decimalString(places), Joi.number());

/**
 * Schema for validating invoice ID (UUID).
 * Used in route parameters for identifying specific invoices.
 *
 * @example
 * const { error } = invoiceIdSchema.validate(req.params.id);
 */
export const invoiceIdSchema = Joi.string().guid().required();

const invoiceItemSchema = Joi.object({
  description: Joi.string().trim().min(1).max(500).required(),
  quantity: decimalValue(4).required(),
  unit_price: decimalValue(2).required(),
  tax_rate: decimalValue(2).allow(null).optional(),
});

const discountSchema = Joi.object({
  type: Joi.string().valid('fixed', 'percentage').required(),
  value: decimalValue(2).required(),
});

/**
 * Schema for creating a new invoice.
 * - client_id is required, project_id is optional (can be null)
 * - due_date must not be before invoice_date when both are given
 * - currency is a three-letter ISO 4217 code
 * - invoice_number, status and totals are never accepted from the caller
 */
export const createInvoiceSchema = Joi.object<CreateInvoiceDto>({
  client_id: Joi.string().guid().required(),
  project_id: Joi.string().guid().allow(null).optional(),
  invoice_date: Joi.date().iso().optional(),
  due_date: Joi.date().iso().when('invoice_date', {
    is: Joi.exist(),
    then: Joi.date().min(Joi.ref('invoice_date')),
  }).optional(),
  items: Joi.array().items(invoiceItemSchema).default([]),
  tax_rate: decimalValue(2).optional(),
  discount: discountSchema.allow(null).optional(),
  currency: Joi.string().length(3).uppercase().optional(),
  notes: Joi.string().max(2000).allow('', null).optional(),
});

/**
 * Schema for updating a draft invoice. At least one field is required;
 * `items`, when present, replaces every line item.
 */
export const updateInvoiceSchema = Joi.object<UpdateInvoiceDto>({
  client_id: Joi.string().guid().optional(),
  project_id: Joi.string().guid().allow(null).optional(),
  invoice_date: Joi.date().iso().optional(),
  due_date: Joi.date().iso().optional(),
  items: Joi.array().items(invoiceItemSchema).optional(),
  tax_rate: decimalValue(2).optional(),
  discount: discountSchema.allow(null).optional(),
  currency: Joi.string().length(3).uppercase().optional(),
  notes: Joi.string().max(2000).allow('', null).optional(),
}).min(1);

export interface SetTermsBody {
  terms: InvoiceTermInput[];
}

/**
 * Schema for replacing the payment terms of a draft invoice.
 */
export const setTermsSchema = Joi.object<SetTermsBody>({
  terms: Joi.array()
    .items(
      Joi.object({
        term_number: Joi.number().integer().min(1).required(),
        percentage: decimalValue(2).required(),
        due_date: Joi.date().iso().required(),
        description: Joi.string().max(255).allow('', null).optional(),
      })
    )
    .required(),
});

/**
 * Query of `GET /api/invoices`. Dates bound the invoice date.
 */
export const listInvoicesQuerySchema = Joi.object<InvoiceListFilter>({
  status: Joi.string().valid(...INVOICE_STATUSES),
  client_id: Joi.string().guid(),
  from: Joi.date().iso(),
  to: Joi.date().iso().when('from', { is: Joi.exist(), then: Joi.date().min(Joi.ref('from')) }),
});

export interface ClientScopeQuery {
  client_id?: string;
}

export const clientScopeQuerySchema = Joi.object<ClientScopeQuery>({
  client_id: Joi.string().guid(),
});
