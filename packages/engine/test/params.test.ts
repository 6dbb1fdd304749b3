import { describe, it, expect, vi, afterEach } from "vitest";
import { createLoanParameters } from "../src/params";
import { UK_2023_24 } from "../src/regime";

const base = {
  startDate: "2024-09-30",
  writeOffDate: "2054-09-30",
  principal: 40_000,
  initialSalary: 30_000,
  salaryGrowth: 3,
};

describe("createLoanParameters", () => {
  afterEach(() => { vi.restoreAllMocks(); });

  it("fills in the default loan terms", () => {
    const p = createLoanParameters(base);
    expect(p.growthMode).toBe("percentage");
    expect(p.repaymentThreshold).toBe(27_295);
    expect(p.repaymentRate).toBe(0.09);
    expect(p.annualInterestRate).toBe(0.043);
    expect(p.plan).toEqual({ upfront: 0, monthlyFixed: 0 });
    expect(p.regime.name).toBe(UK_2023_24.name);
  });

  it("merges a partial repayment plan over the defaults", () => {
    const p = createLoanParameters({ ...base, plan: { monthlyFixed: 25 } });
    expect(p.plan).toEqual({ upfront: 0, monthlyFixed: 25 });
  });

  it("parses string dates and drops the time of day from Date inputs", () => {
    const p = createLoanParameters({ ...base, writeOffDate: new Date(Date.UTC(2054, 8, 30, 15, 45)) });
    expect(p.startDate.getTime()).toBe(Date.UTC(2024, 8, 30));
    expect(p.writeOffDate.getTime()).toBe(Date.UTC(2054, 8, 30));
  });

  it("returns a frozen parameter set", () => {
    const p = createLoanParameters(base);
    expect(Object.isFrozen(p)).toBe(true);
    expect(Object.isFrozen(p.plan)).toBe(true);
    expect(Object.isFrozen(p.regime.incomeTax)).toBe(true);
  });

  it("rejects negative amounts", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(() => createLoanParameters({ ...base, principal: -1 })).toThrow(/principal/);
    expect(() => createLoanParameters({ ...base, plan: { upfront: -10 } })).toThrow(/plan\.upfront/);
    expect(log).toHaveBeenCalledTimes(2);
  });

  it("rejects non-finite rates and unknown days", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    expect(() => createLoanParameters({ ...base, annualInterestRate: Number.NaN })).toThrow(/annualInterestRate/);
    expect(() => createLoanParameters({ ...base, startDate: "2023-02-29" })).toThrow(/startDate/);
  });

  it("rejects band tables that are out of order or bounded", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const regime = {
      name: "broken",
      incomeTax: [{ upTo: 50_000, rate: 0.2 }, { upTo: 10_000, rate: 0 }, { upTo: Infinity, rate: 0.4 }],
      socialInsurance: [{ upTo: 50_000, rate: 0.1 }],
    };
    expect(() => createLoanParameters({ ...base, regime })).toThrow(/strictly ascending/);
    expect(() => createLoanParameters({ ...base, regime })).toThrow(/Top band must be unbounded/);
  });

  it("accepts a write-off date before the start date", () => {
    const p = createLoanParameters({ ...base, writeOffDate: "2020-01-31" });
    expect(p.writeOffDate.getTime()).toBeLessThan(p.startDate.getTime());
  });
});
