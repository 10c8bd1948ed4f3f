import { Money } from '../../utils/money';

export type PaymentType = 'payment' | 'refund';

export type PaymentMethod = 'cash' | 'bank_transfer' | 'card' | 'check' | 'other';

export const PAYMENT_METHODS: readonly PaymentMethod[] = ['cash', 'bank_transfer', 'card', 'check', 'other'];

/**
 * A payment or refund entry. Payments carry a positive amount; a refund is
 * a separate negative entry pointing at the payment it reverses. Entries are
 * never updated or deleted.
 */
export interface Payment {
  id: string;
  invoice_id: string;
  invoice_term_id: string | null;
  amount: Money;
  payment_type: PaymentType;
  payment_method: PaymentMethod;
  reference_number: string | null;
  payment_date: Date;
  notes: string | null;
  refunded_payment_id: string | null;
  refund_reason: string | null;
  created_at: Date;
}

export type NewPayment = Omit<Payment, 'id' | 'created_at'>;

export interface ApplyPaymentDto {
  invoice_id: string;
  invoice_term_id?: string | null;
  amount: number | string;
  payment_method: PaymentMethod;
  reference_number?: string | null;
  payment_date?: Date;
  notes?: string | null;
}

export interface RefundPaymentDto {
  payment_id: string;
  refund_amount: number | string;
  reason: string;
  refund_date?: Date;
}

export interface PaymentFilter {
  from?: Date;
  to?: Date;
  payment_type?: PaymentType;
  /** Most recent `payment_date` first instead of oldest first. */
  newest_first?: boolean;
  limit?: number;
}
