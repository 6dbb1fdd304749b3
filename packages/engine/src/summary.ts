import type { LoanSummary, RepaymentPlan, SimulationState } from './types';

/** Whole years touched by the run, so 25 months counts as 3 years. */
export const yearsRepaying = (months: number): number =>
  Math.floor(months / 12) + (months % 12 !== 0 ? 1 : 0);

/**
 * Reduces a finished run to its headline totals.
 *
 * `totalNetLossPlusRepayments` adds only the plan's own payments (upfront as
 * requested, plus the fixed amount for every month) to the net salary lost.
 * Income-based repayments are already inside the net salary lost figure.
 */
export function summarize(state: SimulationState, plan: RepaymentPlan): LoanSummary {
  const months = state.monthsElapsed;
  const planRepayments = plan.upfront + plan.monthlyFixed * months;

  return {
    totalRepaid: state.totalRepaid,
    netSalaryLostCumulative: state.netSalaryLostCumulative,
    remainingBalance: state.balance,
    repaidInFull: state.repaidInFull,
    monthsRepaying: months,
    yearsRepaying: yearsRepaying(months),
    totalNetLossPlusRepayments: state.netSalaryLostCumulative + planRepayments,
  };
}
