import {
  FunnelCounts,
  KpiId,
  KpiRates,
  KPI_DEFINITIONS,
  RATE_KPI_ORDER,
  RateKpiId,
  STAGE_ORDER,
  StageConversion,
  stageIndex,
} from "../entities";

export interface KpiRanking {
  best: RateKpiId;
  worst: RateKpiId;
}

/** numerator / denominator as a percentage; 0 when the denominator is 0. */
export function computeConversionRate(numerator: number, denominator: number): number {
  return denominator !== 0 ? (numerator / denominator) * 100 : 0;
}

export function computeStageConversions(counts: FunnelCounts): StageConversion[] {
  const conversions: StageConversion[] = [];

  for (let i = 0; i < STAGE_ORDER.length - 1; i++) {
    const fromCount = counts[i];
    const toCount = counts[i + 1];
    conversions.push({
      fromStage: STAGE_ORDER[i],
      toStage: STAGE_ORDER[i + 1],
      fromCount,
      toCount,
      rate: computeConversionRate(toCount, fromCount),
    });
  }

  return conversions;
}

export function computeKpiRates(counts: FunnelCounts): KpiRates {
  const rates = {} as Record<RateKpiId, number>;
  for (const kpi of RATE_KPI_ORDER) {
    rates[kpi] = computeKpiValue(kpi, counts);
  }
  return rates;
}

export function computeKpiValue(kpi: KpiId, counts: FunnelCounts): number {
  const measure = KPI_DEFINITIONS[kpi].measure;
  switch (measure.kind) {
    case "count":
      return counts[stageIndex(measure.stage)];
    case "rate":
      return computeConversionRate(
        counts[stageIndex(measure.numerator)],
        counts[stageIndex(measure.denominator)]
      );
  }
}

/**
 * Highest and lowest rate KPI. Ties resolve to the KPI that comes first in
 * RATE_KPI_ORDER.
 */
export function rankKpis(rates: KpiRates): KpiRanking {
  let best = RATE_KPI_ORDER[0];
  let worst = RATE_KPI_ORDER[0];

  for (const kpi of RATE_KPI_ORDER) {
    if (rates[kpi] > rates[best]) best = kpi;
    if (rates[kpi] < rates[worst]) worst = kpi;
  }

  return { best, worst };
}
