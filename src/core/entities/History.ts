import { FunnelCounts } from "./Funnel";
import { KpiRates } from "./Kpi";

export interface MonthlyKpiRow {
  /** Calendar month as YYYY-MM. */
  month: string;
  counts: FunnelCounts;
  rates: KpiRates;
}
