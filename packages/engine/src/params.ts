import { z } from 'zod';
import type { FiscalRegime, GrowthMode, LoanParameters, RepaymentPlan } from './types';
import { DEFAULT_LOAN_TERMS } from './config';
import { parseISODate, startOfDay } from './calendar';

export interface LoanParametersInput {
  startDate: Date | string;
  writeOffDate: Date | string;
  principal: number;
  initialSalary: number;
  salaryGrowth: number;
  growthMode?: GrowthMode;
  repaymentThreshold?: number;
  repaymentRate?: number;
  annualInterestRate?: number;
  plan?: Partial<RepaymentPlan>;
  regime?: FiscalRegime;
}

const Amount = z.number().finite().nonnegative();

const CalendarDate = z.union([z.date(), z.string()]).transform((value, ctx) => {
  const date = typeof value === 'string' ? parseISODate(value) : startOfDay(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a date as YYYY-MM-DD' });
    return z.NEVER;
  }
  return date;
});

const Bands = z
  .array(z.object({ upTo: z.number().positive(), rate: Amount }))
  .min(1)
  .refine((bands) => bands.every((b, i) => i === 0 || b.upTo > bands[i - 1].upTo), {
    message: 'Band upper bounds must be strictly ascending',
  })
  .refine((bands) => bands.length > 0 && bands[bands.length - 1].upTo === Infinity, {
    message: 'Top band must be unbounded',
  });

const LoanParametersSchema = z.object({
  startDate: CalendarDate,
  writeOffDate: CalendarDate,
  principal: Amount,
  initialSalary: Amount,
  salaryGrowth: z.number().finite(),
  growthMode: z.enum(['percentage', 'fixed']),
  repaymentThreshold: Amount,
  repaymentRate: Amount,
  annualInterestRate: Amount,
  plan: z.object({ upfront: Amount, monthlyFixed: Amount }),
  regime: z.object({ name: z.string().min(1), incomeTax: Bands, socialInsurance: Bands }),
});

/**
 * Fills in the default loan terms, validates, and returns a frozen parameter
 * set. A write-off date on or before the start date is accepted and simply
 * produces an empty projection.
 */
export function createLoanParameters(input: LoanParametersInput): LoanParameters {
  const parsed = LoanParametersSchema.safeParse({
    ...input,
    growthMode: input.growthMode ?? DEFAULT_LOAN_TERMS.growthMode,
    repaymentThreshold: input.repaymentThreshold ?? DEFAULT_LOAN_TERMS.repaymentThreshold,
    repaymentRate: input.repaymentRate ?? DEFAULT_LOAN_TERMS.repaymentRate,
    annualInterestRate: input.annualInterestRate ?? DEFAULT_LOAN_TERMS.annualInterestRate,
    plan: {
      upfront: input.plan?.upfront ?? DEFAULT_LOAN_TERMS.plan.upfront,
      monthlyFixed: input.plan?.monthlyFixed ?? DEFAULT_LOAN_TERMS.plan.monthlyFixed,
    },
    regime: input.regime ?? DEFAULT_LOAN_TERMS.regime,
  });
  if (!parsed.success) {
    console.error('Invalid loan parameters:', parsed.error.flatten().fieldErrors);
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid loan parameters: ${detail}`);
  }

  const { plan, regime, ...terms } = parsed.data;
  return Object.freeze({
    ...terms,
    plan: Object.freeze(plan),
    regime: Object.freeze({
      name: regime.name,
      incomeTax: Object.freeze(regime.incomeTax.map((band) => Object.freeze(band))),
      socialInsurance: Object.freeze(regime.socialInsurance.map((band) => Object.freeze(band))),
    }),
  });
}
