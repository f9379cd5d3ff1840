import Decimal from 'decimal.js';
import { ValidationError } from '../middleware/errorHandler.js';
import { formatCurrency } from './money.js';

/**
 * Systematic Investment Plan projections.
 *
 * Contributions are made at the start of each month (annuity-due), so the
 * ordinary-annuity factor is multiplied by (1 + r):
 *
 *   FV = P × ((1 + r)^n − 1) / r × (1 + r),   r = annualRate / 12 / 100
 *
 * At r = 0 this degrades to FV = P × n. Intermediate values carry 40 significant
 * digits; results are rounded half-up to 2 dp only when returned.
 */
const SipDecimal = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

const NUMERIC = /^-?(\d+(\.\d*)?|\.\d+)$/;

export type Numeric = number | string;

export interface SipForwardInput {
  monthlyInvestment: Numeric;
  annualRate: Numeric; // percent per year, e.g. 12 for 12%
  months: Numeric;
}

export interface SipInverseInput {
  targetValue: Numeric;
  annualRate: Numeric;
  months: Numeric;
}

interface SipRateParams {
  annualRate: number;
  monthlyRate: number;
  months: number;
}

export type SipResult =
  | {
      mode: 'future-value';
      params: SipRateParams & { monthlyInvestment: number };
      futureValue: number;
    }
  | {
      mode: 'required-investment';
      params: SipRateParams & { targetValue: number };
      requiredMonthlyInvestment: number;
    };

export interface SipPlanInput {
  monthlyInvestment: Numeric;
  annualRate: Numeric;
  years?: Numeric;
  months?: Numeric;
  goal?: Numeric;
  currencySymbol?: string;
}

export interface SipPlan {
  projection: Extract<SipResult, { mode: 'future-value' }>;
  goal?: Extract<SipResult, { mode: 'required-investment' }>;
  lines: string[];
}

function toDecimal(field: string, raw: Numeric | undefined): Decimal {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return new SipDecimal(raw);
  }
  if (typeof raw === 'string' && NUMERIC.test(raw.trim())) {
    return new SipDecimal(raw.trim());
  }
  throw new ValidationError(`${field} must be a finite number`, { field });
}

function nonNegative(field: string, raw: Numeric | undefined): Decimal {
  const value = toDecimal(field, raw);
  if (value.isNegative() && !value.isZero()) {
    throw new ValidationError(`${field} must not be negative`, { field });
  }
  return value.abs();
}

function positiveMonths(raw: Numeric | undefined): number {
  const months = toDecimal('months', raw);
  if (!months.isInteger() || months.lessThanOrEqualTo(0)) {
    throw new ValidationError('months must be a positive whole number', { field: 'months' });
  }
  return months.toNumber();
}

function round2(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

interface Growth {
  annualRate: Decimal;
  monthlyRate: Decimal;
  months: number;
  /** Future value of one unit invested each month; equals n when r = 0 */
  factor: Decimal;
}

function growth(annualRateRaw: Numeric, monthsRaw: Numeric): Growth {
  const annualRate = nonNegative('annualRate', annualRateRaw);
  const months = positiveMonths(monthsRaw);
  const monthlyRate = annualRate.dividedBy(12).dividedBy(100);

  const factor = monthlyRate.isZero()
    ? new SipDecimal(months)
    : monthlyRate.plus(1).pow(months).minus(1).dividedBy(monthlyRate).times(monthlyRate.plus(1));

  return { annualRate, monthlyRate, months, factor };
}

function rateParams(g: Growth): SipRateParams {
  return { annualRate: g.annualRate.toNumber(), monthlyRate: g.monthlyRate.toNumber(), months: g.months };
}

export function sipFutureValue(input: SipForwardInput): Extract<SipResult, { mode: 'future-value' }> {
  const principal = nonNegative('monthlyInvestment', input.monthlyInvestment);
  const g = growth(input.annualRate, input.months);

  return {
    mode: 'future-value',
    params: { ...rateParams(g), monthlyInvestment: principal.toNumber() },
    futureValue: round2(principal.times(g.factor)),
  };
}

export function sipRequiredInvestment(input: SipInverseInput): Extract<SipResult, { mode: 'required-investment' }> {
  const target = nonNegative('targetValue', input.targetValue);
  const g = growth(input.annualRate, input.months);

  return {
    mode: 'required-investment',
    params: { ...rateParams(g), targetValue: target.toNumber() },
    requiredMonthlyInvestment: round2(target.dividedBy(g.factor)),
  };
}

/** Resolve the plan length; fractional years are truncated to whole months */
function planMonths(input: SipPlanInput): Numeric {
  if (input.months !== undefined) return input.months;
  if (input.years === undefined) {
    throw new ValidationError('Either years or months is required', { field: 'years' });
  }
  const years = toDecimal('years', input.years);
  if (years.lessThanOrEqualTo(0)) {
    throw new ValidationError('years must be greater than zero', { field: 'years' });
  }
  const months = years.times(12).floor();
  if (months.isZero()) {
    throw new ValidationError('The plan must span at least one month', { field: 'years' });
  }
  return months.toNumber();
}

/**
 * Forward projection plus, when a goal is given, the monthly amount needed to
 * reach it over the same period. `lines` is a ready-to-display summary.
 */
export function planSip(input: SipPlanInput): SipPlan {
  const months = planMonths(input);
  const projection = sipFutureValue({
    monthlyInvestment: input.monthlyInvestment,
    annualRate: input.annualRate,
    months,
  });
  const goal =
    input.goal === undefined || input.goal === ''
      ? undefined
      : sipRequiredInvestment({ targetValue: input.goal, annualRate: input.annualRate, months });

  const symbol = input.currencySymbol ?? '';
  const money = (value: number) => formatCurrency(new Decimal(value), symbol);
  const n = projection.params.months;

  const lines = [
    `Monthly SIP: ${money(projection.params.monthlyInvestment)}`,
    `Annual return assumed: ${new Decimal(projection.params.annualRate).toFixed(2)}%`,
    `Period: ${new Decimal(n).dividedBy(12).toFixed(1)} years (${n} months)`,
    '',
    `Estimated corpus at end: ${money(projection.futureValue)}`,
  ];
  if (goal) {
    lines.push(
      `To reach goal ${money(goal.params.targetValue)}, you need ~ ${money(goal.requiredMonthlyInvestment)}/month`
    );
  }
  lines.push('', 'Suggestion: Automate this SIP via your bank or mutual fund platform. Start small and increase regularly.');

  return { projection, goal, lines };
}
