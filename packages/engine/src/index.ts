// packages/engine/src/index.ts

import type { GrowthMode, HistoryPoint, LoanParameters, LoanSummary, SimulationResult, SimulationState } from './types';
import { afterTaxSalary, incomeRepayment } from './deductions';
import { lastDayOfNextMonth, toISODate } from './calendar';
import { summarize } from './summary';
import { NO_DATA_MESSAGE } from './report';

// ---------- helpers ----------
/**
 * Converts a nominal annual rate to the rate charged each month. Plain 1/12
 * division, not the compounding-equivalent rate.
 */
const annualToMonthlyRate = (annualRate: number): number => annualRate / 12;

/**
 * Applies one year's salary growth: percent for 'percentage', pounds for 'fixed'.
 */
export function grownSalary(salary: number, growth: number, mode: GrowthMode): number {
  return mode === 'percentage' ? salary * (1 + growth / 100) : salary + growth;
}

class LoanLedger {
  private balance: number;
  private repaid = 0;
  private readonly r: number;

  constructor(principal: number, annualInterestRate: number) {
    this.balance = Math.max(0, principal);
    this.r = annualToMonthlyRate(annualInterestRate);
  }

  get outstanding(): number { return this.balance; }
  get totalRepaid(): number { return this.repaid; }

  // Payments never take the balance below zero.
  pay(amount: number): number {
    const actual = Math.min(amount, this.balance);
    this.balance -= actual;
    this.repaid += actual;
    return actual;
  }

  accrue(): void {
    this.balance *= 1 + this.r;
  }

  clear(): void {
    this.balance = 0;
  }
}

// ---------- main simulation function ----------
/**
 * Projects the loan month by month until it is repaid or the write-off date
 * is reached. Every call starts from the parameters alone and returns a new
 * state and history.
 */
export function simulateLoan(parameters: LoanParameters): SimulationResult {
  const {
    startDate, writeOffDate, principal, initialSalary, salaryGrowth, growthMode,
    repaymentThreshold, repaymentRate, annualInterestRate, plan, regime,
  } = parameters;

  const loan = new LoanLedger(principal, annualInterestRate);
  const history: HistoryPoint[] = [];
  let netSalaryLost = 0;
  let monthsElapsed = 0;
  let repaidInFull = false;

  loan.pay(plan.upfront);

  let date = startDate;
  let salary = initialSalary;
  let salaryYear = date.getUTCFullYear();

  while (date.getTime() < writeOffDate.getTime() && loan.outstanding > 0) {
    const annualRepayment = incomeRepayment(salary, repaymentThreshold, repaymentRate);
    const takeHomeWithout = afterTaxSalary(salary, regime);
    const takeHomeWith = afterTaxSalary(salary - annualRepayment, regime);

    history.push({
      date: toISODate(date),
      salary,
      balance: loan.outstanding,
      totalRepaid: loan.totalRepaid,
      netSalaryLost,
      afterTaxSalary: takeHomeWith,
    });

    netSalaryLost += (takeHomeWithout - takeHomeWith) / 12;

    loan.pay(annualRepayment / 12 + plan.monthlyFixed);
    loan.accrue();

    // Growth lands once per calendar year, on the first month seen in a new year.
    if (date.getUTCFullYear() > salaryYear) {
      salary = grownSalary(salary, salaryGrowth, growthMode);
      salaryYear = date.getUTCFullYear();
    }

    monthsElapsed += 1;
    date = lastDayOfNextMonth(date);

    if (loan.outstanding <= 0) {
      loan.clear();
      repaidInFull = true;
      break;
    }
  }

  const state: SimulationState = {
    balance: loan.outstanding,
    totalRepaid: loan.totalRepaid,
    netSalaryLostCumulative: netSalaryLost,
    monthsElapsed,
    repaidInFull,
  };
  return { parameters, state, history };
}

/**
 * Holds one validated parameter set. `simulate` can be called any number of
 * times; the most recent result stays available to the reporting helpers.
 */
export class StudentLoanEngine {
  private latest: SimulationResult | null = null;

  constructor(readonly parameters: LoanParameters) {}

  get lastRun(): SimulationResult | null { return this.latest; }

  simulate(): SimulationResult {
    this.latest = simulateLoan(this.parameters);
    return this.latest;
  }

  summarize(result: SimulationResult | null = this.latest): LoanSummary | null {
    if (!result) {
      console.warn(NO_DATA_MESSAGE);
      return null;
    }
    return summarize(result.state, result.parameters.plan);
  }
}

export * from './types';
export { incomeTax, socialInsurance, incomeRepayment, afterTaxSalary, bandedCharge } from './deductions';
export { lastDayOfNextMonth, parseISODate, toISODate } from './calendar';
export { UK_2023_24 } from './regime';
export { DEFAULT_LOAN_TERMS, SAMPLE_GRADUATE } from './config';
export { createLoanParameters } from './params';
export type { LoanParametersInput } from './params';
export { summarize, yearsRepaying } from './summary';
export { NO_DATA_MESSAGE, formatSummary, printSummary, toChartSeries, buildRepaymentChart } from './report';
export type { SummaryLine, ChartSeries } from './report';
