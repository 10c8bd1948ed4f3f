// Invoice-related models

import { Money, Percentage } from '../../utils/money';
import type { Payment } from './payment.model';

/**
 * Status values persisted on an invoice.
 * `overdue` is never stored; it is derived at read time (see EffectiveInvoiceStatus).
 */
export type InvoiceStatus = 'draft' | 'sent' | 'paid' | 'cancelled';

/**
 * Status reported to callers, including the derived `overdue` state.
 */
export type EffectiveInvoiceStatus = InvoiceStatus | 'overdue';

export const INVOICE_STATUSES: readonly EffectiveInvoiceStatus[] = ['draft', 'sent', 'paid', 'overdue', 'cancelled'];

export type TermStatus = 'pending' | 'paid';
export type EffectiveTermStatus = TermStatus | 'overdue';

export type DiscountType = 'fixed' | 'percentage';

/**
 * Discount as entered by the user. A fixed discount is a currency amount,
 * a percentage discount is a rate applied to the subtotal.
 */
export type Discount =
  | { type: 'fixed'; value: Money }
  | { type: 'percentage'; value: Percentage };

/**
 * Line item as submitted by a caller, before totals are computed.
 */
export interface InvoiceItemInput {
  description: string;
  quantity: number | string;
  unit_price: number | string;
  tax_rate?: number | string | null;
}

export interface DiscountInput {
  type: DiscountType;
  value: number | string;
}

/**
 * Data transfer object for creating a new invoice.
 * Financial totals are calculated from the items; the invoice number is generated.
 *
 * @example
 * const newInvoice: CreateInvoiceDto = {
 *   client_id: 'client-uuid',
 *   invoice_date: new Date('2024-01-15'),
 *   due_date: new Date('2024-02-15'),
 *   items: [{ description: 'Design work', quantity: 10, unit_price: 85 }],
 *   tax_rate: 19,
 *   discount: { type: 'percentage', value: 5 },
 * };
 */
export interface CreateInvoiceDto {
  client_id: string;
  project_id?: string | null;
  invoice_date?: Date;
  due_date?: Date;
  items: InvoiceItemInput[];
  tax_rate?: number | string;
  discount?: DiscountInput | null;
  currency?: string;
  notes?: string | null;
}

/**
 * Partial update of a draft invoice. Supplying `items` replaces all line items.
 */
export interface UpdateInvoiceDto {
  client_id?: string;
  project_id?: string | null;
  invoice_date?: Date;
  due_date?: Date;
  items?: InvoiceItemInput[];
  tax_rate?: number | string;
  discount?: DiscountInput | null;
  currency?: string;
  notes?: string | null;
}

/**
 * Listing criteria. `overdue` selects sent invoices past their due date and
 * `sent` the ones still within it.
 */
export interface InvoiceListFilter {
  status?: EffectiveInvoiceStatus;
  client_id?: string;
  from?: Date;
  to?: Date;
}

export interface InvoiceTermInput {
  term_number: number;
  percentage: number | string;
  due_date: Date;
  description?: string | null;
}

/**
 * Invoice row as persisted. `version` increases with every committed write
 * and is what concurrent writers compare against.
 */
export interface Invoice {
  id: string;
  invoice_number: string;
  client_id: string;
  project_id: string | null;
  invoice_date: Date;
  due_date: Date;
  tax_rate: Percentage;
  discount: Discount | null;
  sub_total: Money;
  discount_amount: Money;
  tax_amount: Money;
  total_amount: Money;
  currency: string;
  status: InvoiceStatus;
  notes: string | null;
  version: number;
  created_at: Date;
  updated_at: Date;
}

export interface InvoiceItem {
  id: string;
  invoice_id: string;
  position: number;
  description: string;
  /** Quantity in ten-thousandths. */
  quantity: bigint;
  unit_price: Money;
  tax_rate: Percentage | null;
  total_price: Money;
}

export interface InvoiceTerm {
  id: string;
  invoice_id: string;
  term_number: number;
  percentage: Percentage;
  amount: Money;
  due_date: Date;
  description: string | null;
  status: TermStatus;
}

/**
 * An invoice together with everything owned by it, loaded as one unit.
 */
export interface InvoiceAggregate {
  invoice: Invoice;
  items: InvoiceItem[];
  terms: InvoiceTerm[];
  payments: Payment[];
}

export type NewInvoice = Omit<Invoice, 'id' | 'version' | 'created_at' | 'updated_at'>;
export type NewInvoiceItem = Omit<InvoiceItem, 'id' | 'invoice_id'>;
export type NewInvoiceTerm = Omit<InvoiceTerm, 'id' | 'invoice_id'>;

/** Invoice row with its effective status, as returned by listings. */
export interface InvoiceListEntry extends Omit<Invoice, 'status'> {
  status: EffectiveInvoiceStatus;
}

export interface InvoiceTermView extends Omit<InvoiceTerm, 'status'> {
  status: EffectiveTermStatus;
  paid_amount: Money;
  remaining_balance: Money;
}

export interface InvoiceItemView extends Omit<InvoiceItem, 'quantity'> {
  quantity: number;
}

/**
 * Invoice as returned to callers, with balances recomputed from payments.
 */
export interface InvoiceView extends Omit<Invoice, 'status'> {
  status: EffectiveInvoiceStatus;
  paid_amount: Money;
  remaining_balance: Money;
  payment_percentage: number;
  is_fully_paid: boolean;
  is_partially_paid: boolean;
  days_overdue: number;
  items: InvoiceItemView[];
  terms: InvoiceTermView[];
  payments: Payment[];
  statistics: {
    total_items: number;
    total_terms: number;
    total_payments: number;
    paid_terms: number;
    pending_terms: number;
    overdue_terms: number;
  };
}
