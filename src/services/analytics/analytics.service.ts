/**
 * @fileoverview Analytics service for the financial dashboard.
 *
 * Provides aggregated figures for:
 * - Income, expenses and profit of a period and of all time
 * - Outstanding balance and invoice counts by status
 * - Collection rate of invoiced value
 * - Month-by-month income/expense trend with growth rates
 * - Ledger-wide counts and recent activity
 *
 * Everything is computed from committed ledger records and nothing is cached,
 * so asking twice for the same range yields the same result.
 *
 * @module services/analytics/analytics.service
 */

import { EffectiveInvoiceStatus, InvoiceListEntry } from '../../models/financial/invoice.model';
import { Payment } from '../../models/financial/payment.model';
import { FinanceTransaction } from '../../models/financial/transaction.model';
import { LedgerStore } from '../../repositories/ledger.store';
import {
  daysBetween,
  endOfUtcMonth,
    monthsInRange,
  startOfUtcDay,
  startOfUtcMonth,
  toIsoDate,
  toMonthKey,
} from '../../utils/dates';
import { ValidationError } from '../../utils/errors';
import { Money, ratioPercent } from '../../utils/money';
import { effectiveStatusAt } from '../financial/invoice-balance';

/**
 * Date range of a summary, inclusive on both ends.
 *
 * @interface SummaryRange
 * @property {Date} from - First day of the period
 * @property {Date} to - Last day of the period
 */
export interface SummaryRange {
  from: Date;
  to: Date;
}

/**
 * One calendar month of the trend series.
 *
 * @interface MonthlyTrendPoint
 * @property {string} month - Month in YYYY-MM format
 * @property {Money} income - Income posted in the month
 * @property {Money} expenses - Expenses posted in the month
 * @property {Money} profit - Income minus expenses
 */
export interface MonthlyTrendPoint {
  month: string;
  income: Money;
  expenses: Money;
  profit: Money;
}

/**
 * Dashboard summary for a period.
 *
 * @interface FinancialSummary
 * @property {object} period - ISO dates of the range and its length in days
 * @property {object} financial - Income, expenses, profit, margin, payments received and outstanding balance
 * @property {object} invoices - Counts by effective status, invoiced and collected value, collection rate
 * @property {object} trends - Monthly series with first-to-last growth rates in percent
 */
export interface FinancialSummary {
  period: {
    from: string;
    to: string;
    days: number;
  };
  financial: {
    income: Money;
    expenses: Money;
    profit: Money;
    profit_margin: number;
    all_time_income: Money;
    all_time_expenses: Money;
    all_time_profit: Money;
    payments_received: Money;
    outstanding: Money;
  };
  invoices: {
    total_count: number;
    by_status: Record<EffectiveInvoiceStatus, number>;
    overdue_count: number;
    total_value: Money;
    paid_value: Money;
    collection_rate: number;
  };
  trends: {
    monthly: MonthlyTrendPoint[];
    income_growth: number;
    expense_growth: number;
  };
}

/**
 * Ledger-wide counts and the latest entries, independent of any period.
 *
 * @interface DashboardOverview
 * @property {object} counts - Record counts and open/overdue invoice counts
 * @property {object} recent_activity - Newest invoices by creation and newest payments by payment date
 */
export interface DashboardOverview {
  counts: {
    total_invoices: number;
    total_payments: number;
    total_refunds: number;
    open_invoices: number;
    overdue_invoices: number;
  };
  recent_activity: {
    recent_invoices: InvoiceListEntry[];
    recent_payments: Payment[];
  };
}

export const RECENT_ACTIVITY_LIMIT = 5;

export type ReportType = 'monthly' | 'quarterly' | 'yearly';

export interface PeriodReport extends FinancialSummary {
  report_type: ReportType;
  /** e.g. 2024-03, 2024-Q1, 2024 */
  label: string;
}

const sumOfType = (transactions: FinanceTransaction[], type: FinanceTransaction['transaction_type']): Money =>
  Money.sum(transactions.filter((tx) => tx.transaction_type === type).map((tx) => tx.amount));

/**
 * Growth from the first to the last value in percent.
 * 0 with fewer than two points; 100 when starting from zero and ending above it.
 */
export const growthRate = (series: Money[]): number => {
  if (series.length < 2) return 0;
  const first = series[0];
  const last = series[series.length - 1];
  if (first.isZero()) {
    return last.isPositive() ? 100 : 0;
  }
  return ratioPercent(last.subtract(first), first.abs());
};

const emptyStatusCounts = (): Record<EffectiveInvoiceStatus, number> => ({
  draft: 0,
  sent: 0,
  paid: 0,
  overdue: 0,
  cancelled: 0,
});

export interface AnalyticsServiceOptions {
  now?: () => Date;
}

export class AnalyticsService {
  private readonly now: () => Date;

  constructor(private readonly store: LedgerStore, options: AnalyticsServiceOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Builds the dashboard summary for a period.
   *
   * Invoice figures cover invoices dated within the period; `outstanding`
   * covers every sent invoice regardless of date.
   *
   * @example
   * const summary = await analyticsService.getFinancialSummary({
   *   from: new Date('2024-01-01'),
   *   to: new Date('2024-03-31'),
   * });
   * // summary.trends.monthly: [{ month: '2024-01', ... }, { month: '2024-02', ... }, { month: '2024-03', ... }]
   */
  async getFinancialSummary(range: SummaryRange): Promise<FinancialSummary> {
    const from = startOfUtcDay(range.from);
    const to = startOfUtcDay(range.to);
    if (Number.isNaN(from.getTime()) || Number.isNaN(to.getTime())) {
      throw new ValidationError('Summary range must consist of valid dates');
    }
    if (from.getTime() > to.getTime()) {
      throw new ValidationError('Summary range start must not be after its end');
    }
    const now = this.now();

    const [inPeriod, allTime, payments, openInvoices, periodInvoices] = await Promise.all([
      this.store.listTransactions({ from, to }),
      this.store.sumTransactions(),
      this.store.listPayments({ from, to }),
      this.store.listInvoices({ status: 'sent' }),
      this.store.listInvoices({ from, to }),
    ]);

    const income = sumOfType(inPeriod, 'income');
    const expenses = sumOfType(inPeriod, 'expense');
    const profit = income.subtract(expenses);
    const allTimeIncome = allTime.income;
    const allTimeExpenses = allTime.expense;

    const outstanding = Money.sum(openInvoices.map((invoice) => invoice.total_amount));

    const byStatus = emptyStatusCounts();
    for (const invoice of periodInvoices) {
      byStatus[effectiveStatusAt(invoice, now)] += 1;
    }
    const totalValue = Money.sum(
      periodInvoices.filter((invoice) => invoice.status !== 'cancelled').map((invoice) => invoice.total_amount)
    );
    const paidValue = Money.sum(
      periodInvoices.filter((invoice) => invoice.status === 'paid').map((invoice) => invoice.total_amount)
    );

    const monthly = monthsInRange(from, to).map((monthStart): MonthlyTrendPoint => {
      const key = toMonthKey(monthStart);
      const ofMonth = inPeriod.filter((tx) => toMonthKey(tx.transaction_date) === key);
      const monthIncome = sumOfType(ofMonth, 'income');
      const monthExpenses = sumOfType(ofMonth, 'expense');
      return { month: key, income: monthIncome, expenses: monthExpenses, profit: monthIncome.subtract(monthExpenses) };
    });

    return {
      period: {
        from: toIsoDate(from),
        to: toIsoDate(to),
        days: daysBetween(from, to) + 1,
      },
      financial: {
        income,
        expenses,
        profit,
        profit_margin: ratioPercent(profit, income),
        all_time_income: allTimeIncome,
        all_time_expenses: allTimeExpenses,
        all_time_profit: allTimeIncome.subtract(allTimeExpenses),
        payments_received: Money.sum(payments.map((payment) => payment.amount)),
        outstanding,
      },
      invoices: {
        total_count: periodInvoices.length,
        by_status: byStatus,
        overdue_count: byStatus.overdue,
        total_value: totalValue,
        paid_value: paidValue,
        collection_rate: ratioPercent(paidValue, totalValue),
      },
      trends: {
        monthly,
        income_growth: growthRate(monthly.map((point) => point.income)),
        expense_growth: growthRate(monthly.map((point) => point.expenses)),
      },
    };
  }

  /**
   * Counts over the whole ledger plus the most recent invoices and payments.
   */
  async getOverview(limit: number = RECENT_ACTIVITY_LIMIT): Promise<DashboardOverview> {
    const today = startOfUtcDay(this.now());
    const [counts, openInvoices, overdueInvoices, recentInvoices, recentPayments] = await Promise.all([
      this.store.countRecords(),
      this.store.listInvoices({ status: 'sent' }),
      this.store.listInvoices({ status: 'sent', due_before: today }),
      this.store.listInvoices({ newest_first: true, limit }),
      this.store.listPayments({ newest_first: true, limit }),
    ]);

    return {
      counts: {
        total_invoices: counts.invoices,
        total_payments: counts.payments,
        total_refunds: counts.refunds,
        open_invoices: openInvoices.length,
        overdue_invoices: overdueInvoices.length,
      },
      recent_activity: {
        recent_invoices: recentInvoices.map((invoice) => ({ ...invoice, status: effectiveStatusAt(invoice, today) })),
        recent_payments: recentPayments,
      },
    };
  }

  private toReport(summary: FinancialSummary, reportType: ReportType, label: string): PeriodReport {
    console.log(`[Analytics] Generated ${reportType} report ${label}`);
    return { ...summary, report_type: reportType, label };
  }

  /**
   * @param month - 1 to 12
   */
  async generateMonthlyReport(year: number, month: number): Promise<PeriodReport> {
    checkYear(year);
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new ValidationError(`Month must be between 1 and 12, got ${month}`);
    }
    const summary = await this.getFinancialSummary({
      from: startOfUtcMonth(year, month - 1),
      to: endOfUtcMonth(year, month - 1),
    });
    return this.toReport(summary, 'monthly', `${year}-${String(month).padStart(2, '0')}`);
  }

  /**
   * @param quarter - 1 to 4
   */
  async generateQuarterlyReport(year: number, quarter: number): Promise<PeriodReport> {
    checkYear(year);
    if (!Number.isInteger(quarter) || quarter < 1 || quarter > 4) {
      throw new ValidationError(`Quarter must be between 1 and 4, got ${quarter}`);
    }
    const firstMonth = (quarter - 1) * 3;
    const summary = await this.getFinancialSummary({
      from: startOfUtcMonth(year, firstMonth),
      to: endOfUtcMonth(year, firstMonth + 2),
    });
    return this.toReport(summary, 'quarterly', `${year}-Q${quarter}`);
  }

  async generateYearlyReport(year: number): Promise<PeriodReport> {
    checkYear(year);
    const summary = await this.getFinancialSummary({
      from: startOfUtcMonth(year, 0),
      to: endOfUtcMonth(year, 11),
    });
    return this.toReport(summary, 'yearly', String(year));
  }
}

function checkYear(year: number): void {
  if (!Number.isInteger(year) || year < 1900 || year > 9999) {
    throw new ValidationError(`Year must be between 1900 and 9999, got ${year}`);
  }
}
