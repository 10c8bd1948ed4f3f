import { InvoiceTermInput, NewInvoiceTerm } from '../../models/financial/invoice.model';
import { InvalidScheduleError, ValidationError } from '../../utils/errors';
import { Money, Percentage, PERCENT_SCALE, parseScaled } from '../../utils/money';

/**
 * Largest allowed gap between the term percentages and 100%, in hundredths of
 * a percent. Splitting 100% into n two-decimal shares loses at most half a
 * hundredth per share.
 */
export const scheduleTolerance = (termCount: number): bigint => BigInt(Math.floor(termCount / 2));

const parsePercentage = (term: InvoiceTermInput): Percentage => {
  let basisPoints: bigint;
  try {
    basisPoints = parseScaled(term.percentage, PERCENT_SCALE, `Term ${term.term_number} percentage`);
  } catch (err) {
    if (err instanceof ValidationError) throw new InvalidScheduleError(err.message);
    throw err;
  }
  if (basisPoints <= 0n || basisPoints > Percentage.HUNDRED) {
    throw new InvalidScheduleError(`Term ${term.term_number} percentage must be greater than 0 and at most 100`);
  }
  return Percentage.fromBasisPoints(basisPoints);
};

/**
 * Splits an invoice total across payment terms.
 *
 * Every term but the last gets round(total × percentage / 100); the last term
 * takes whatever is left so the amounts add up to the total exactly.
 * An empty schedule is valid and clears the terms.
 */
export function scheduleTerms(total: Money, inputs: InvoiceTermInput[]): NewInvoiceTerm[] {
  if (inputs.length === 0) {
    return [];
  }

  const ordered = [...inputs].sort((a, b) => a.term_number - b.term_number);
  ordered.forEach((term, index) => {
    if (!Number.isInteger(term.term_number) || term.term_number !== index + 1) {
      throw new InvalidScheduleError(`Term numbers must run from 1 to ${ordered.length} without gaps or duplicates`);
    }
    if (!(term.due_date instanceof Date) || Number.isNaN(term.due_date.getTime())) {
      throw new InvalidScheduleError(`Term ${term.term_number} has an invalid due date`);
    }
  });

  const percentages = ordered.map(parsePercentage);
  const sum = percentages.reduce((acc, pct) => acc + pct.basisPoints, 0n);
  const drift = sum > Percentage.HUNDRED ? sum - Percentage.HUNDRED : Percentage.HUNDRED - sum;
  if (drift > scheduleTolerance(ordered.length)) {
    throw new InvalidScheduleError(
      `Term percentages must add up to 100, got ${Percentage.fromBasisPoints(sum).toDecimal()}`
    );
  }

  let allocated = Money.zero();
  return ordered.map((term, index) => {
    const isLast = index === ordered.length - 1;
    const amount = isLast ? total.subtract(allocated) : total.percent(percentages[index]);
    if (amount.isNegative()) {
      throw new InvalidScheduleError(`Term ${term.term_number} would receive a negative amount`);
    }
    allocated = allocated.add(amount);
    return {
      term_number: term.term_number,
      percentage: percentages[index],
      amount,
      due_date: term.due_date,
      description: term.description ?? null,
      status: 'pending',
    };
  });
}
