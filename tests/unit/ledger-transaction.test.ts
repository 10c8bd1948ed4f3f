import { runLedgerTransaction } from '../../src/services/financial/ledger-transaction';
import { LedgerConflictError, LedgerContentionError, NotFoundError } from '../../src/utils/errors';
import { MemoryLedgerStore } from '../helpers/memory-ledger.store';

describe('runLedgerTransaction', () => {
  const policy = { maxAttempts: 3, retryDelayMs: 0 };

  it('should return the result of the unit of work', async () => {
    const store = new MemoryLedgerStore();

    await expect(runLedgerTransaction(store, 'inv-1', policy, async () => 'done')).resolves.toBe('done');
    expect(store.commits).toBe(1);
  });

  it('should retry write conflicts until the unit of work commits', async () => {
    const store = new MemoryLedgerStore();
    const work = jest.fn(async () => 'committed');
    jest
      .spyOn(store, 'transaction')
      .mockRejectedValueOnce(new LedgerConflictError('stale version'))
      .mockRejectedValueOnce(new LedgerConflictError('stale version'));

    await expect(runLedgerTransaction(store, 'inv-1', policy, work)).resolves.toBe('committed');
    expect(store.transaction).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenLastCalledWith(
      '[PaymentLedger] Write conflict on invoice inv-1 (attempt 2/3), retrying: stale version'
    );
  });

  it('should give up with a contention error once every attempt conflicted', async () => {
    const store = new MemoryLedgerStore();
    const transaction = jest.spyOn(store, 'transaction').mockRejectedValue(new LedgerConflictError('stale version'));

    const failure = runLedgerTransaction(store, 'inv-1', policy, async () => 'never');

    await expect(failure).rejects.toBeInstanceOf(LedgerContentionError);
    await expect(failure).rejects.toThrow('Invoice inv-1 is being modified concurrently; gave up after 3 attempts');
    expect(transaction).toHaveBeenCalledTimes(3);
  });

  it('should not retry other errors', async () => {
    const store = new MemoryLedgerStore();
    const transaction = jest.spyOn(store, 'transaction');

    await expect(
      runLedgerTransaction(store, 'inv-1', policy, async () => {
        throw new NotFoundError('Invoice', 'inv-1');
      })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(transaction).toHaveBeenCalledTimes(1);
    expect(store.commits).toBe(0);
  });
});
