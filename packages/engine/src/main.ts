// packages/engine/src/main.ts

import { parseArgs } from 'node:util';
import { writeFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { StudentLoanEngine, createLoanParameters, printSummary, buildRepaymentChart, SAMPLE_GRADUATE } from './index';
import type { GrowthMode, LoanParametersInput } from './index';

const USAGE = `Usage: student-loan [options]

  --sample                 start from a sample graduate (other flags override it)
  --start <YYYY-MM-DD>     first month of the projection
  --write-off <YYYY-MM-DD> date any remaining balance is written off
  --principal <£>          loan balance at the start date
  --salary <£>             gross annual salary at the start date
  --growth <n>             annual salary growth
  --growth-mode <mode>     percentage (default) or fixed
  --threshold <£>          repayment threshold
  --rate <n>               share of income above the threshold repaid, e.g. 0.09
  --interest <n>           nominal annual interest rate, e.g. 0.043
  --upfront <£>            one-off payment at the start date
  --monthly <£>            fixed extra payment every month
  --chart <file>           write a Chart.js line chart configuration as JSON
  --help                   show this message`;

const options = {
  sample: { type: 'boolean' },
  start: { type: 'string' },
  'write-off': { type: 'string' },
  principal: { type: 'string' },
  salary: { type: 'string' },
  growth: { type: 'string' },
  'growth-mode': { type: 'string' },
  threshold: { type: 'string' },
  rate: { type: 'string' },
  interest: { type: 'string' },
  upfront: { type: 'string' },
  monthly: { type: 'string' },
  chart: { type: 'string' },
  help: { type: 'boolean' },
} as const;

export interface CliRequest {
  inputs: LoanParametersInput;
  chartPath?: string;
}

const isGrowthMode = (v: string): v is GrowthMode => v === 'percentage' || v === 'fixed';

function numberFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) throw new Error(`Invalid --${name}: ${raw}`);
  return n;
}

function required<T>(name: string, value: T | undefined): T {
  if (value === undefined) throw new Error(`Missing --${name}`);
  return value;
}

/**
 * Turns command-line flags into loan inputs. Returns null when help was asked for.
 */
export function readInputs(argv: string[]): CliRequest | null {
  const { values } = parseArgs({ args: argv, options, strict: true, allowPositionals: false });
  if (values.help) return null;

  const base = values.sample ? SAMPLE_GRADUATE : undefined;
  const rawMode = values['growth-mode'];
  let growthMode: GrowthMode | undefined;
  if (rawMode !== undefined) {
    if (!isGrowthMode(rawMode)) throw new Error(`Invalid --growth-mode: ${rawMode} (expected percentage or fixed)`);
    growthMode = rawMode;
  }

  const inputs: LoanParametersInput = {
    startDate: required('start', values.start ?? base?.startDate),
    writeOffDate: required('write-off', values['write-off'] ?? base?.writeOffDate),
    principal: required('principal', numberFlag('principal', values.principal) ?? base?.principal),
    initialSalary: required('salary', numberFlag('salary', values.salary) ?? base?.initialSalary),
    salaryGrowth: required('growth', numberFlag('growth', values.growth) ?? base?.salaryGrowth),
    growthMode,
    repaymentThreshold: numberFlag('threshold', values.threshold),
    repaymentRate: numberFlag('rate', values.rate),
    annualInterestRate: numberFlag('interest', values.interest),
    plan: {
      upfront: numberFlag('upfront', values.upfront),
      monthlyFixed: numberFlag('monthly', values.monthly),
    },
  };
  return { inputs, chartPath: values.chart };
}

/**
 * Runs one projection from flags and prints its summary. Returns the exit code.
 */
export function runCli(argv: string[]): number {
  try {
    const request = readInputs(argv);
    if (!request) {
      console.log(USAGE);
      return 0;
    }

    const engine = new StudentLoanEngine(createLoanParameters(request.inputs));
    const result = engine.simulate();
    printSummary(result);

    if (request.chartPath) {
      const chart = buildRepaymentChart(result);
      if (chart) {
        writeFileSync(request.chartPath, JSON.stringify(chart, null, 2));
        console.log(`Chart written to ${request.chartPath}`);
      }
    }
    return 0;
  } catch (e) {
    console.error(e instanceof Error ? e.message : e);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = runCli(process.argv.slice(2));
}
