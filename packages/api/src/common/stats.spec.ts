import { mean, quantile, round, sampleStd, valuesOf } from "./stats";

describe("stats", () => {
  it("computes the mean, or null for no values", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBeNull();
  });

  it("computes the sample standard deviation", () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.138, 3);
    expect(sampleStd([70])).toBeNull();
  });

  it("interpolates quantiles linearly", () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantile([4, 1, 3, 2], 0.75)).toBe(3.25);
    expect(quantile([], 0.5)).toBeNull();
  });

  it("rounds to the given precision", () => {
    expect(round(72.456)).toBe(72.46);
    expect(round(7.25, 1)).toBe(7.3);
  });

  it("collects present values of a column", () => {
    const rows = [{ w: 70 }, { w: null }, { w: 71 }];
    expect(valuesOf(rows, "w")).toEqual([70, 71]);
  });
});
