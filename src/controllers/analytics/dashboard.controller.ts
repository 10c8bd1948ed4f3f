import { Request, Response } from 'express';
import { AnalyticsService, PeriodReport } from '../../services/analytics/analytics.service';
import { ReportQuery, overviewQuerySchema, reportQuerySchema, summaryQuerySchema } from '../../schemas/analytics/dashboard.schema';
import { sendLedgerError, validateRequest } from '../../utils/http';

export class DashboardController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  /**
   * @example
   * GET /api/dashboard/summary?from=2024-01-01&to=2024-03-31
   */
  async getSummary(req: Request, res: Response): Promise<void> {
    const query = validateRequest(summaryQuerySchema, req.query, res);
    if (!query) return;

    try {
      const summary = await this.analyticsService.getFinancialSummary(query);
      res.status(200).json(summary);
    } catch (err) {
      sendLedgerError(res, err, 'Financial summary');
    }
  }

  /**
   * @example
   * GET /api/dashboard/overview?limit=5
   */
  async getOverview(req: Request, res: Response): Promise<void> {
    const query = validateRequest(overviewQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.status(200).json(await this.analyticsService.getOverview(query.limit));
    } catch (err) {
      sendLedgerError(res, err, 'Dashboard overview');
    }
  }

  /**
   * @example
   * GET /api/dashboard/reports/quarterly?year=2024&quarter=1
   */
  async getReport(req: Request, res: Response): Promise<void> {
    const query = validateRequest(reportQuerySchema, { ...req.query, period: req.params.period }, res);
    if (!query) return;

    try {
      res.status(200).json(await this.generate(query));
    } catch (err) {
      sendLedgerError(res, err, 'Period report');
    }
  }

  private generate(query: ReportQuery): Promise<PeriodReport> {
    switch (query.period) {
      case 'monthly':
        return this.analyticsService.generateMonthlyReport(query.year, query.month ?? 0);
      case 'quarterly':
        return this.analyticsService.generateQuarterlyReport(query.year, query.quarter ?? 0);
      case 'yearly':
        return this.analyticsService.generateYearlyReport(query.year);
    }
  }
}
