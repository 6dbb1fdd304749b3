import type { ChartConfiguration, ChartDataset } from 'chart.js';
import type { HistoryPoint, LoanSummary, SimulationResult } from './types';
import { summarize } from './summary';

export const NO_DATA_MESSAGE = 'No simulation data found. Run simulate() first.';

export type SummaryLine = [label: string, value: string];

export interface ChartSeries {
  dates: string[];
  salary: number[];
  balance: number[];
  totalRepaid: number[];
  netSalaryLost: number[];
  afterTaxSalary: number[];
}

export type RepaymentChart = ChartConfiguration<'line', number[], string>;

const money = (n: number): string => n.toFixed(2);
const fmtGBP = (n: number) => (Number.isFinite(n) ? n : 0).toLocaleString('en-GB', { style: 'currency', currency: 'GBP', maximumFractionDigits: 0 });

export function formatSummary(summary: LoanSummary): SummaryLine[] {
  return [
    ['Total repaid', money(summary.totalRepaid)],
    ['Net salary lost (after tax + NI)', money(summary.netSalaryLostCumulative)],
    ['Remaining loan balance', money(summary.remainingBalance)],
    ['Loan repaid in full', summary.repaidInFull ? 'Yes' : 'No'],
    ['Months repaying', String(summary.monthsRepaying)],
    ['Years repaying (approx)', String(summary.yearsRepaying)],
    ['Total net salary lost + repayments', money(summary.totalNetLossPlusRepayments)],
  ];
}

/**
 * Logs one "label: value" line per summary field. Without a result it warns
 * and returns null.
 */
export function printSummary(result: SimulationResult | null): LoanSummary | null {
  if (!result) {
    console.warn(NO_DATA_MESSAGE);
    return null;
  }
  const summary = summarize(result.state, result.parameters.plan);
  for (const [label, value] of formatSummary(summary)) {
    console.log(`${label}: ${value}`);
  }
  return summary;
}

export function toChartSeries(history: readonly HistoryPoint[]): ChartSeries {
  return {
    dates: history.map((p) => p.date),
    salary: history.map((p) => p.salary),
    balance: history.map((p) => p.balance),
    totalRepaid: history.map((p) => p.totalRepaid),
    netSalaryLost: history.map((p) => p.netSalaryLost),
    afterTaxSalary: history.map((p) => p.afterTaxSalary),
  };
}

const dataset = (label: string, data: number[], color: string, dashed = false): ChartDataset<'line', number[]> => ({
  label,
  data,
  borderColor: color,
  backgroundColor: color,
  borderWidth: 2,
  borderDash: dashed ? [6, 4] : [],
  pointRadius: 0,
  // each value holds until the next point
  stepped: 'before',
});

/**
 * Chart.js line chart of the five monthly series. Returns null, with a
 * warning, when there is nothing to plot.
 */
export function buildRepaymentChart(result: SimulationResult | null): RepaymentChart | null {
  if (!result || result.history.length === 0) {
    console.warn(NO_DATA_MESSAGE);
    return null;
  }
  const series = toChartSeries(result.history);

  return {
    type: 'line',
    data: {
      labels: series.dates,
      datasets: [
        dataset('Salary', series.salary, '#657C6A'),
        dataset('Loan Balance', series.balance, '#BB3E00'),
        dataset('Total Repaid', series.totalRepaid, '#F7AD45'),
        dataset('Net Salary Lost (After Tax + NI)', series.netSalaryLost, '#F7AD45', true),
        dataset('Salary (After Tax + NI)', series.afterTaxSalary, '#657C6A', true),
      ],
    },
    options: {
      responsive: true,
      animation: false,
      interaction: { mode: 'index', intersect: false },
      scales: {
        x: { title: { display: true, text: 'Date' } },
        y: { title: { display: true, text: 'Amount (£)' }, ticks: { callback: (value: number | string) => fmtGBP(Number(value)) } },
      },
      plugins: {
        title: { display: true, text: 'Student Loan Repayment Over Time' },
        legend: { display: true },
      },
    },
  };
}
