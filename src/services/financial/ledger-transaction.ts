import { InvoiceAggregate, InvoiceTerm } from '../../models/financial/invoice.model';
import { LedgerStore, LedgerUnitOfWork } from '../../repositories/ledger.store';
import { config } from '../../utils/config';
import { LedgerConflictError, LedgerContentionError } from '../../utils/errors';
import { computeBalance, resolveInvoiceStatus, resolveTermStatus } from './invoice-balance';

export interface RetryPolicy {
  maxAttempts: number;
  /** Base delay; attempt n waits n times this long before retrying. */
  retryDelayMs: number;
}

export const defaultRetryPolicy = (): RetryPolicy => ({
  maxAttempts: config.ledgerMaxAttempts,
  retryDelayMs: config.ledgerRetryDelayMs,
});

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `work` as one unit of work against the invoice identified by
 * `invoiceId`, restarting it from the read when the commit loses a race.
 * Any error other than a write conflict propagates on the first attempt.
 *
 * @throws {LedgerContentionError} When every attempt ended in a conflict
 */
export async function runLedgerTransaction<T>(
  store: LedgerStore,
  invoiceId: string,
  policy: RetryPolicy,
  work: (uow: LedgerUnitOfWork) => Promise<T>
): Promise<T> {
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await store.transaction(work);
    } catch (err) {
      if (!(err instanceof LedgerConflictError)) {
        throw err;
      }
      if (attempt === policy.maxAttempts) {
        break;
      }
      console.warn(
        `[PaymentLedger] Write conflict on invoice ${invoiceId} (attempt ${attempt}/${policy.maxAttempts}), retrying: ${err.message}`
      );
      if (policy.retryDelayMs > 0) {
        await sleep(policy.retryDelayMs * attempt);
      }
    }
  }
  throw new LedgerContentionError(invoiceId, policy.maxAttempts);
}

/**
 * Re-derives invoice and term statuses from the payment history of
 * `aggregate`, persists the changed term rows and saves the invoice. Saving
 * always bumps the version, which is what serializes writers of the invoice.
 */
export async function reconcileInvoice(uow: LedgerUnitOfWork, aggregate: InvoiceAggregate): Promise<InvoiceAggregate> {
  const balance = computeBalance(aggregate.invoice, aggregate.payments);
  const status = resolveInvoiceStatus(aggregate.invoice, balance);

  const terms: InvoiceTerm[] = [];
  for (const term of aggregate.terms) {
    const termStatus = resolveTermStatus(term, status, balance);
    if (termStatus !== term.status) {
      await uow.setTermStatus(term.id, termStatus);
    }
    terms.push({ ...term, status: termStatus });
  }

  const invoice = await uow.saveInvoice({ ...aggregate.invoice, status });
  return { ...aggregate, invoice, terms };
}
