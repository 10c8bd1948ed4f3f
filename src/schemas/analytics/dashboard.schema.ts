import * as Joi from 'joi';

export interface SummaryQuery {
  from: Date;
  to: Date;
}

export const summaryQuerySchema = Joi.object<SummaryQuery>({
  from: Joi.date().iso().required(),
  to: Joi.date().iso().min(Joi.ref('from')).required(),
});

export interface OverviewQuery {
  limit: number;
}

export const overviewQuerySchema = Joi.object<OverviewQuery>({
  limit: Joi.number().integer().min(1).max(50).default(5),
});

export interface ReportQuery {
  period: 'monthly' | 'quarterly' | 'yearly';
  year: number;
  month?: number;
  quarter?: number;
}

/**
 * Route param `period` plus query `year` and, depending on the period,
 * `month` or `quarter`. Validated against the merged params and query.
 */
export const reportQuerySchema = Joi.object<ReportQuery>({
  period: Joi.string().valid('monthly', 'quarterly', 'yearly').required(),
  year: Joi.number().integer().min(1900).max(9999).required(),
  month: Joi.number().integer().min(1).max(12).when('period', {
    is: 'monthly',
    then: Joi.required(),
    otherwise: Joi.forbidden(),
  }),
  quarter: Joi.number().integer().min(1).max(4).when('period', {
    is: 'quarterly',
    then: Joi.required(),
    otherwise: Joi.forbidden(),
  }),
});
