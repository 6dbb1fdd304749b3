export type GrowthMode = 'percentage' | 'fixed';

/** Payer-chosen payments layered on top of income-based repayment. */
export interface RepaymentPlan {
  upfront: number;        // pounds, applied once before the first month
  monthlyFixed: number;   // pounds, added every month
}

export interface TaxBand {
  upTo: number;           // upper bound of the band, Infinity for the top band
  rate: number;           // marginal rate, 0.2 = 20%
}

export interface FiscalRegime {
  name: string;
  incomeTax: readonly TaxBand[];
  socialInsurance: readonly TaxBand[];
}

export interface LoanParameters {
  startDate: Date;
  writeOffDate: Date;
  principal: number;            // pounds
  initialSalary: number;        // pounds per year
  salaryGrowth: number;         // percent or pounds per year, see growthMode
  growthMode: GrowthMode;
  repaymentThreshold: number;   // pounds per year
  repaymentRate: number;        // 0.09 = 9% of income above threshold
  annualInterestRate: number;   // nominal, 0.043 = 4.3%
  plan: RepaymentPlan;
  regime: FiscalRegime;
}

export interface SimulationState {
  balance: number;
  totalRepaid: number;
  netSalaryLostCumulative: number;
  monthsElapsed: number;
  repaidInFull: boolean;
}

export interface HistoryPoint {
  date: string;           // YYYY-MM-DD
  salary: number;
  balance: number;        // before this month's repayment and interest
  totalRepaid: number;
  netSalaryLost: number;
  afterTaxSalary: number; // with the income-based repayment deducted
}

export interface SimulationResult {
  parameters: LoanParameters;
  state: SimulationState;
  history: HistoryPoint[];
}

export interface LoanSummary {
  totalRepaid: number;
  netSalaryLostCumulative: number;
  remainingBalance: number;
  repaidInFull: boolean;
  monthsRepaying: number;
  yearsRepaying: number;
  totalNetLossPlusRepayments: number;
}
