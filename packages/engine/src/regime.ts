import type { FiscalRegime } from './types';

/**
 * UK income tax and Class 1 National Insurance for the 2023-24 tax year.
 */
export const UK_2023_24: FiscalRegime = {
  name: 'UK 2023-24',
  incomeTax: [
    { upTo: 12_570, rate: 0 },      // personal allowance
    { upTo: 50_270, rate: 0.2 },    // basic rate
    { upTo: 125_140, rate: 0.4 },   // higher rate
    { upTo: Infinity, rate: 0.45 }, // additional rate
  ],
  socialInsurance: [
    { upTo: 12_570, rate: 0 },      // primary threshold
    { upTo: 50_270, rate: 0.12 },   // upper earnings limit
    { upTo: Infinity, rate: 0.02 },
  ],
};
