import {
  ALL_EMPLOYEES,
  Employee,
  EmployeeBreakdown,
  FunnelCounts,
  MonthlyKpiRow,
  NAMED_EMPLOYEES,
  NamedEmployee,
} from "../entities";
import { ClampedDistribution, clampedNormal, createRandom, stableHash } from "../random/SeededRandom";
import { DateInput, trailingMonths } from "../../utils/time";
import { computeKpiRates } from "./MetricsCalculator";

export interface GeneratorConfig {
  impressionsMin: number;
  impressionsMax: number;
  /** Ratio of each stage to the one before it: CTR, Click→Lead, Lead→MQL, MQL→SQL, SQL→Won. */
  stageRatios: readonly [
    ClampedDistribution,
    ClampedDistribution,
    ClampedDistribution,
    ClampedDistribution,
    ClampedDistribution,
  ];
  employeeWeights: Readonly<Record<NamedEmployee, number>>;
  employeeFactor: ClampedDistribution;
  historyMonths: number;
  driftStart: number;
  driftStep: number;
  driftNoise: ClampedDistribution;
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  impressionsMin: 1_800_000,
  impressionsMax: 2_500_000,
  stageRatios: [
    { mean: 0.018, stdDev: 0.006, min: 0.006, max: 0.06 },
    { mean: 0.07, stdDev: 0.02, min: 0.02, max: 0.22 },
    { mean: 0.45, stdDev: 0.12, min: 0.10, max: 0.85 },
    { mean: 0.35, stdDev: 0.10, min: 0.08, max: 0.80 },
    { mean: 0.18, stdDev: 0.07, min: 0.02, max: 0.55 },
  ],
  employeeWeights: {
    Sofía: 0.28,
    Mateo: 0.25,
    Valentina: 0.25,
    Juan: 0.22,
  },
  employeeFactor: { mean: 1.0, stdDev: 0.08, min: 0.85, max: 1.15 },
  historyMonths: 3,
  driftStart: 0.90,
  driftStep: 0.06,
  driftNoise: { mean: 0, stdDev: 0.03, min: -0.05, max: 0.05 },
};

export const DEFAULT_BASE_SEED = 11;
export const DEFAULT_SPLIT_SEED = 11;
export const ALL_EMPLOYEES_HISTORY_SEED = 77;

export interface HistoryOptions {
  /** Any date inside the newest month. Defaults to now. */
  referenceDate?: DateInput;
  config?: Partial<GeneratorConfig>;
}

export function generateBaseFunnel(seed: number, config?: Partial<GeneratorConfig>): FunnelCounts {
  const cfg = { ...DEFAULT_GENERATOR_CONFIG, ...config };
  const random = createRandom(seed);

  const values = [random.integer(cfg.impressionsMin, cfg.impressionsMax)];
  for (const ratio of cfg.stageRatios) {
    const previous = values[values.length - 1];
    values.push(Math.trunc(previous * clampedNormal(random, ratio)));
  }

  return enforceMonotone(values);
}

export function splitByEmployee(
  base: FunnelCounts,
  seed: number,
  config?: Partial<GeneratorConfig>
): EmployeeBreakdown {
  const cfg = { ...DEFAULT_GENERATOR_CONFIG, ...config };
  const random = createRandom(seed);
  const totalWeight = NAMED_EMPLOYEES.reduce((sum, e) => sum + cfg.employeeWeights[e], 0);

  const perEmployee = {} as Record<Employee, FunnelCounts>;
  for (const employee of NAMED_EMPLOYEES) {
    const weight = totalWeight > 0 ? cfg.employeeWeights[employee] / totalWeight : 0;
    const share = weight * clampedNormal(random, cfg.employeeFactor);
    perEmployee[employee] = enforceMonotone(base.map((count) => Math.trunc(count * share)));
  }

  perEmployee[ALL_EMPLOYEES] = sumCounts(NAMED_EMPLOYEES.map((e) => perEmployee[e]));
  return perEmployee;
}

/** Base drift per month plus clamped noise, drawn in month order from `seed`. */
export function sampleDriftMultipliers(seed: number, config?: Partial<GeneratorConfig>): number[] {
  const cfg = { ...DEFAULT_GENERATOR_CONFIG, ...config };
  if (!Number.isInteger(cfg.historyMonths) || cfg.historyMonths < 1) {
    throw new Error(`historyMonths must be a positive integer, got ${cfg.historyMonths}`);
  }

  const random = createRandom(seed);
  const multipliers: number[] = [];
  for (let idx = 0; idx < cfg.historyMonths; idx++) {
    multipliers.push(cfg.driftStart + cfg.driftStep * idx + clampedNormal(random, cfg.driftNoise));
  }
  return multipliers;
}

export function generateMonthlyHistory(
  counts: FunnelCounts,
  seed: number,
  options: HistoryOptions = {}
): MonthlyKpiRow[] {
  const multipliers = sampleDriftMultipliers(seed, options.config);
  const months = trailingMonths(multipliers.length, options.referenceDate);

  return months.map((month, idx) => {
    const scaled = enforceMonotone(counts.map((count) => Math.trunc(count * multipliers[idx])));
    return { month, counts: scaled, rates: computeKpiRates(scaled) };
  });
}

/** Seed for an employee's history: fixed for "All", FNV-1a of the name otherwise. */
export function deriveHistorySeed(employee: Employee): number {
  if (employee === ALL_EMPLOYEES) return ALL_EMPLOYEES_HISTORY_SEED;
  return stableHash(employee) % 10_000;
}

/** Cap each stage at the count of the stage before it. */
export function enforceMonotone(values: readonly number[]): FunnelCounts {
  if (values.length !== 6) {
    throw new Error(`Expected 6 stage counts, got ${values.length}`);
  }
  const [impressions, ...rest] = values.map((v) => Math.max(0, v));
  const clicks = Math.min(rest[0], impressions);
  const leads = Math.min(rest[1], clicks);
  const mql = Math.min(rest[2], leads);
  const sql = Math.min(rest[3], mql);
  const won = Math.min(rest[4], sql);
  return [impressions, clicks, leads, mql, sql, won];
}

function sumCounts(rows: readonly FunnelCounts[]): FunnelCounts {
  const totals = [0, 0, 0, 0, 0, 0];
  for (const row of rows) {
    row.forEach((count, i) => {
      totals[i] += count;
    });
  }
  return enforceMonotone(totals);
}
