import { Money } from '../../utils/money';

export type AccountType = 'asset' | 'liability' | 'income' | 'expense' | 'equity';

export interface Account {
  id: string;
  code: string;
  name: string;
  type: AccountType;
  is_active: boolean;
}

export type TransactionType = 'income' | 'expense';

/**
 * Append-only finance ledger entry. Amounts are always positive;
 * the direction is given by `transaction_type`.
 */
export interface FinanceTransaction {
  id: string;
  account_id: string;
  invoice_id: string | null;
  project_id: string | null;
  payment_id: string | null;
  transaction_type: TransactionType;
  amount: Money;
  transaction_date: Date;
  description: string;
  created_at: Date;
}

export type NewFinanceTransaction = Omit<FinanceTransaction, 'id' | 'created_at'>;

/** Inclusive range on `transaction_date`; either end may be open. */
export interface TransactionFilter {
  from?: Date;
  to?: Date;
}

export interface TransactionTotals {
  income: Money;
  expense: Money;
}
