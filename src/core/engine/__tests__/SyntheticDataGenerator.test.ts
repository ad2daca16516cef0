import {
  DEFAULT_GENERATOR_CONFIG,
  deriveHistorySeed,
  enforceMonotone,
  generateBaseFunnel,
  generateMonthlyHistory,
  sampleDriftMultipliers,
  splitByEmployee,
} from "../SyntheticDataGenerator";
import { FunnelCounts, KpiId, NAMED_EMPLOYEES, STAGE_ORDER } from "../../entities";
import { stableHash } from "../../random/SeededRandom";

function expectNonIncreasing(counts: FunnelCounts): void {
  for (let i = 0; i < counts.length - 1; i++) {
    expect(counts[i]).toBeGreaterThanOrEqual(counts[i + 1]);
  }
}

function expectIntegers(counts: FunnelCounts): void {
  for (const count of counts) {
    expect(Number.isInteger(count)).toBe(true);
    expect(count).toBeGreaterThanOrEqual(0);
  }
}

describe("SyntheticDataGenerator", () => {
  describe("generateBaseFunnel", () => {
    it("should produce a non-increasing funnel of non-negative integers for many seeds", () => {
      for (let seed = 0; seed < 200; seed++) {
        const counts = generateBaseFunnel(seed);
        expect(counts).toHaveLength(STAGE_ORDER.length);
        expectIntegers(counts);
        expectNonIncreasing(counts);
      }
    });

    it("should draw impressions within the configured range", () => {
      for (let seed = 0; seed < 100; seed++) {
        const [impressions] = generateBaseFunnel(seed);
        expect(impressions).toBeGreaterThanOrEqual(1_800_000);
        expect(impressions).toBeLessThan(2_500_000);
      }
    });

    it("should keep each stage ratio inside its clamp range", () => {
      for (let seed = 0; seed < 100; seed++) {
        const counts = generateBaseFunnel(seed);
        DEFAULT_GENERATOR_CONFIG.stageRatios.forEach((ratio, i) => {
          // trunc can only push the observed ratio down by less than one unit
          expect(counts[i + 1]).toBeLessThanOrEqual(counts[i] * ratio.max);
          expect(counts[i + 1]).toBeGreaterThan(counts[i] * ratio.min - 1);
        });
      }
    });

    it("should be reproducible for the same seed", () => {
      expect(generateBaseFunnel(11)).toEqual(generateBaseFunnel(11));
    });

    it("should differ across seeds", () => {
      expect(generateBaseFunnel(11)).not.toEqual(generateBaseFunnel(12));
    });

    it("should honor config overrides", () => {
      const counts = generateBaseFunnel(3, { impressionsMin: 1000, impressionsMax: 1001 });
      expect(counts[0]).toBe(1000);
    });
  });

  describe("splitByEmployee", () => {
    const base = generateBaseFunnel(11);

    it("should make All the exact element-wise sum of the named employees", () => {
      for (let seed = 0; seed < 50; seed++) {
        const breakdown = splitByEmployee(base, seed);
        for (let i = 0; i < STAGE_ORDER.length; i++) {
          const sum = NAMED_EMPLOYEES.reduce((acc, e) => acc + breakdown[e][i], 0);
          expect(breakdown.All[i]).toBe(sum);
        }
      }
    });

    it("should keep every employee's funnel non-increasing", () => {
      const breakdown = splitByEmployee(base, 11);
      for (const employee of NAMED_EMPLOYEES) {
        expectIntegers(breakdown[employee]);
        expectNonIncreasing(breakdown[employee]);
      }
      expectNonIncreasing(breakdown.All);
    });

    it("should keep each employee's share within the perturbed weight", () => {
      const breakdown = splitByEmployee(base, 11);
      for (const employee of NAMED_EMPLOYEES) {
        const weight = DEFAULT_GENERATOR_CONFIG.employeeWeights[employee];
        expect(breakdown[employee][0]).toBeGreaterThanOrEqual(Math.trunc(base[0] * weight * 0.85) - 1);
        expect(breakdown[employee][0]).toBeLessThanOrEqual(Math.trunc(base[0] * weight * 1.15) + 1);
      }
    });

    it("should be reproducible for the same seed", () => {
      expect(splitByEmployee(base, 11)).toEqual(splitByEmployee(base, 11));
    });

    it("should split an empty funnel into zeros", () => {
      const breakdown = splitByEmployee([0, 0, 0, 0, 0, 0], 1);
      expect(breakdown.All).toEqual([0, 0, 0, 0, 0, 0]);
      expect(breakdown.Mateo).toEqual([0, 0, 0, 0, 0, 0]);
    });
  });

  describe("sampleDriftMultipliers", () => {
    it("should keep each month within 0.05 of its base drift", () => {
      for (let seed = 0; seed < 200; seed++) {
        const multipliers = sampleDriftMultipliers(seed);
        expect(multipliers).toHaveLength(3);
        [0.90, 0.96, 1.02].forEach((drift, idx) => {
          expect(multipliers[idx]).toBeGreaterThanOrEqual(drift - 0.05 - 1e-9);
          expect(multipliers[idx]).toBeLessThanOrEqual(drift + 0.05 + 1e-9);
        });
      }
    });

    it("should reduce to the base drift when noise is disabled", () => {
      const multipliers = sampleDriftMultipliers(5, {
        driftNoise: { mean: 0, stdDev: 0, min: 0, max: 0 },
      });
      expect(multipliers[0]).toBeCloseTo(0.90, 10);
      expect(multipliers[1]).toBeCloseTo(0.96, 10);
      expect(multipliers[2]).toBeCloseTo(1.02, 10);
    });

    it("should throw when asked for no months", () => {
      expect(() => sampleDriftMultipliers(1, { historyMonths: 0 })).toThrow("historyMonths");
    });
  });

  describe("generateMonthlyHistory", () => {
    const counts: FunnelCounts = [2_000_000, 36_000, 2_520, 1_134, 397, 71];

    it("should return three rows ordered oldest to newest", () => {
      const rows = generateMonthlyHistory(counts, 77, { referenceDate: "2026-10-18" });
      expect(rows.map((r) => r.month)).toEqual(["2026-08", "2026-09", "2026-10"]);
    });

    it("should scale counts by the sampled drift multiplier", () => {
      const multipliers = sampleDriftMultipliers(77);
      const rows = generateMonthlyHistory(counts, 77, { referenceDate: "2026-10-18" });
      rows.forEach((row, idx) => {
        expect(row.counts[0]).toBe(Math.trunc(counts[0] * multipliers[idx]));
        expectNonIncreasing(row.counts);
        expectIntegers(row.counts);
      });
    });

    it("should derive rates from each row's own counts", () => {
      const rows = generateMonthlyHistory(counts, 9, { referenceDate: "2026-10-18" });
      for (const row of rows) {
        expect(row.rates[KpiId.CTR]).toBeCloseTo((row.counts[1] / row.counts[0]) * 100, 10);
        expect(row.rates[KpiId.SQL_TO_WON]).toBeCloseTo((row.counts[5] / row.counts[4]) * 100, 10);
      }
    });

    it("should be reproducible for the same seed", () => {
      const a = generateMonthlyHistory(counts, 1234, { referenceDate: "2026-10-18" });
      const b = generateMonthlyHistory(counts, 1234, { referenceDate: "2026-10-18" });
      expect(a).toEqual(b);
    });

    it("should report zero rates for an empty funnel", () => {
      const rows = generateMonthlyHistory([0, 0, 0, 0, 0, 0], 77, { referenceDate: "2026-10-18" });
      for (const row of rows) {
        expect(Object.values(row.rates)).toEqual([0, 0, 0, 0, 0]);
      }
    });

    it("should follow historyMonths from config", () => {
      const rows = generateMonthlyHistory(counts, 77, {
        referenceDate: "2026-10-18",
        config: { historyMonths: 5 },
      });
      expect(rows.map((r) => r.month)).toEqual(["2026-06", "2026-07", "2026-08", "2026-09", "2026-10"]);
    });
  });

  describe("deriveHistorySeed", () => {
    it("should use the fixed seed for All", () => {
      expect(deriveHistorySeed("All")).toBe(77);
    });

    it("should hash named employees into [0, 10000)", () => {
      for (const employee of NAMED_EMPLOYEES) {
        const seed = deriveHistorySeed(employee);
        expect(seed).toBe(stableHash(employee) % 10_000);
        expect(seed).toBeGreaterThanOrEqual(0);
        expect(seed).toBeLessThan(10_000);
      }
    });
  });

  describe("enforceMonotone", () => {
    it("should cap each stage at the previous stage", () => {
      expect(enforceMonotone([100, 120, 50, 60, 10, 20])).toEqual([100, 100, 50, 50, 10, 10]);
    });

    it("should reject vectors of the wrong length", () => {
      expect(() => enforceMonotone([1, 2, 3])).toThrow("Expected 6 stage counts");
    });
  });
});
