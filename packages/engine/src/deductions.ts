import type { FiscalRegime, TaxBand } from './types';
import { UK_2023_24 } from './regime';

/**
 * Applies a progressive band table to an annual amount. Each band taxes the
 * slice between the previous band's upper bound and its own.
 */
export function bandedCharge(amount: number, bands: readonly TaxBand[]): number {
  let charge = 0;
  let previous = 0;
  let remaining = amount;

  for (const { upTo, rate } of bands) {
    const taxable = Math.min(upTo - previous, remaining);
    if (taxable <= 0) break;
    charge += taxable * rate;
    remaining -= taxable;
    previous = upTo;
  }
  return charge;
}

export const incomeTax = (grossAnnualSalary: number, bands: readonly TaxBand[] = UK_2023_24.incomeTax): number =>
  bandedCharge(grossAnnualSalary, bands);

export const socialInsurance = (grossAnnualSalary: number, bands: readonly TaxBand[] = UK_2023_24.socialInsurance): number =>
  bandedCharge(grossAnnualSalary, bands);

/**
 * Annual income-contingent repayment. Callers divide by 12 for the monthly
 * figure rather than recomputing from a monthly salary.
 */
export function incomeRepayment(grossAnnualSalary: number, threshold: number, rate: number): number {
  return Math.max(0, grossAnnualSalary - threshold) * rate;
}

/**
 * Salary left after income tax and social insurance, both charged on the
 * same taxable amount.
 */
export function afterTaxSalary(
  taxableSalary: number,
  regime: Pick<FiscalRegime, 'incomeTax' | 'socialInsurance'> = UK_2023_24,
): number {
  return taxableSalary - incomeTax(taxableSalary, regime.incomeTax) - socialInsurance(taxableSalary, regime.socialInsurance);
}
