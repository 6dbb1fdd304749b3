import type { LoanParameters } from './types';
import { UK_2023_24 } from './regime';

export type LoanTerms = Pick<
  LoanParameters,
  'growthMode' | 'repaymentThreshold' | 'repaymentRate' | 'annualInterestRate' | 'plan' | 'regime'
>;

// Plan 2 terms as used when the caller does not override them.
export const DEFAULT_LOAN_TERMS: LoanTerms = {
  growthMode: 'percentage',
  repaymentThreshold: 27_295,
  repaymentRate: 0.09,
  annualInterestRate: 0.043,
  plan: { upfront: 0, monthlyFixed: 0 },
  regime: UK_2023_24,
};

/** A recent graduate on a starting salary, written off after 30 years. */
export const SAMPLE_GRADUATE = {
  startDate: '2024-09-30',
  writeOffDate: '2054-09-30',
  principal: 40_000,
  initialSalary: 30_000,
  salaryGrowth: 3,
};
