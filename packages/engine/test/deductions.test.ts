import { describe, it, expect } from "vitest";
import { afterTaxSalary, incomeRepayment, incomeTax, socialInsurance } from "../src/deductions";

describe("incomeTax", () => {
  it("charges nothing up to the personal allowance", () => {
    expect(incomeTax(0)).toBe(0);
    expect(incomeTax(10_000)).toBe(0);
    expect(incomeTax(12_570)).toBe(0);
  });

  it("charges basic rate up to 50,270", () => {
    expect(incomeTax(50_270)).toBeCloseTo((50_270 - 12_570) * 0.2, 6);
  });

  it("charges higher rate up to 125,140", () => {
    expect(incomeTax(125_140)).toBeCloseTo(incomeTax(50_270) + (125_140 - 50_270) * 0.4, 6);
  });

  it("has no ceiling on the additional rate", () => {
    // 7,540 basic + 29,948 higher + 74,860 * 45%
    expect(incomeTax(200_000)).toBeCloseTo(71_175, 6);
  });

  it("treats a negative salary as no income", () => {
    expect(incomeTax(-5_000)).toBe(0);
  });

  it("accepts another band table", () => {
    expect(incomeTax(50_000, [{ upTo: Infinity, rate: 0.1 }])).toBeCloseTo(5_000, 6);
  });
});

describe("socialInsurance", () => {
  it("charges nothing below the primary threshold", () => {
    expect(socialInsurance(12_570)).toBe(0);
    expect(socialInsurance(8_000)).toBe(0);
  });

  it("charges 12% up to the upper earnings limit", () => {
    expect(socialInsurance(50_270)).toBeCloseTo((50_270 - 12_570) * 0.12, 6);
  });

  it("charges 2% above the upper earnings limit", () => {
    expect(socialInsurance(60_000)).toBeCloseTo(4_524 + 9_730 * 0.02, 6);
  });
});

describe("incomeRepayment", () => {
  it("repays the rate on income above the threshold", () => {
    expect(incomeRepayment(30_000, 27_295, 0.09)).toBeCloseTo(243.45, 6);
  });

  it("is zero at or below the threshold", () => {
    expect(incomeRepayment(27_295, 27_295, 0.09)).toBe(0);
    expect(incomeRepayment(20_000, 27_295, 0.09)).toBe(0);
  });
});

describe("afterTaxSalary", () => {
  it("deducts tax and NI from the same amount", () => {
    // 40,000 - 5,486 tax - 3,291.60 NI
    expect(afterTaxSalary(40_000)).toBeCloseTo(31_222.4, 6);
  });
});
