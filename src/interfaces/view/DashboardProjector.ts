import {
  DashboardTab,
  Employee,
  EmployeeBreakdown,
  FunnelCounts,
  FunnelStage,
  KpiDefinition,
  KpiId,
  KPI_DEFINITIONS,
  KPI_ORDER,
  MonthlyKpiRow,
  RateKpiId,
  STAGE_ORDER,
  ViewState,
} from "../../core/entities";
import {
  computeConversionRate,
  computeKpiRates,
  computeKpiValue,
  rankKpis,
} from "../../core/engine/MetricsCalculator";
import { fmtInt, fmtPct, fmtThousands } from "../../utils/format";

export const DASHBOARD_OBJECTIVES: readonly string[] = Object.freeze([
  "Measure funnel efficiency per stage (conversion vs. the previous step).",
  "Find bottlenecks to prioritize optimizations (landing, scoring, sales).",
  "Compare performance per employee to assess impact and coaching.",
]);

export const INSIGHTS_TIP = "Tip: click a KPI to see its 3-month trend.";

export interface FunnelBar {
  stage: FunnelStage;
  count: number;
  /** Percentage of the previous stage; null for the first stage. */
  percentOfPrevious: number | null;
  label: string;
}

export interface KpiCardView {
  id: KpiId;
  title: string;
  help: string;
  value: string;
  subtitle: string;
  selected: boolean;
}

export interface RateInsight {
  kpi: RateKpiId;
  title: string;
  rate: number;
  text: string;
}

export interface InsightsView {
  worst: RateInsight;
  best: RateInsight;
  wonTotal: string;
  tip: string;
}

export interface OverviewView {
  employee: Employee;
  objectives: readonly string[];
  funnel: FunnelBar[];
  cards: KpiCardView[];
  insights: InsightsView;
}

export interface TrendPoint {
  month: string;
  value: number;
}

export interface DetailsTable {
  header: [string, string];
  rows: [string, string][];
}

export interface DetailsView {
  employee: Employee;
  kpi: KpiId;
  title: string;
  trend: TrendPoint[];
  description: string;
  table: DetailsTable;
}

export interface DashboardView {
  state: ViewState;
  activeTab: DashboardTab;
  overview: OverviewView;
  details: DetailsView;
}

export function projectFunnel(counts: FunnelCounts): FunnelBar[] {
  return STAGE_ORDER.map((stage, i) => {
    if (i === 0) {
      return { stage, count: counts[i], percentOfPrevious: null, label: `${fmtInt(counts[i])} · Base` };
    }
    const percent = computeConversionRate(counts[i], counts[i - 1]);
    return { stage, count: counts[i], percentOfPrevious: percent, label: `${fmtInt(counts[i])} · ${fmtPct(percent)}` };
  });
}

export function projectOverview(employee: Employee, counts: FunnelCounts, selectedKpi?: KpiId): OverviewView {
  const rates = computeKpiRates(counts);
  const cards = KPI_ORDER.map((id) => {
    const definition = KPI_DEFINITIONS[id];
    return {
      id,
      title: definition.title,
      help: definition.help,
      value: formatKpiValue(definition, computeKpiValue(id, counts)),
      subtitle: definition.subtitle,
      selected: id === selectedKpi,
    };
  });

  const { best, worst } = rankKpis(rates);
  const insight = (kpi: RateKpiId): RateInsight => ({
    kpi,
    title: KPI_DEFINITIONS[kpi].title,
    rate: rates[kpi],
    text: `${KPI_DEFINITIONS[kpi].title} · ${fmtPct(rates[kpi])}`,
  });

  return {
    employee,
    objectives: DASHBOARD_OBJECTIVES,
    funnel: projectFunnel(counts),
    cards,
    insights: {
      worst: insight(worst),
      best: insight(best),
      wonTotal: fmtThousands(counts[counts.length - 1]),
      tip: INSIGHTS_TIP,
    },
  };
}

export function projectDetails(employee: Employee, kpi: KpiId, history: readonly MonthlyKpiRow[]): DetailsView {
  const definition = KPI_DEFINITIONS[kpi];
  const trend = history.map((row) => ({ month: row.month, value: computeKpiValue(kpi, row.counts) }));

  return {
    employee,
    kpi,
    title: definition.title,
    trend,
    description: `Employee: ${employee} · ${definition.explanation}`,
    table: {
      header: ["Month", definition.title],
      rows: trend.map((point): [string, string] => [point.month, formatKpiValue(definition, point.value)]),
    },
  };
}

export function projectDashboard(
  state: ViewState,
  breakdown: EmployeeBreakdown,
  history: readonly MonthlyKpiRow[]
): DashboardView {
  return {
    state,
    activeTab: state.tab,
    overview: projectOverview(state.employee, breakdown[state.employee], state.kpi),
    details: projectDetails(state.employee, state.kpi, history),
  };
}

function formatKpiValue(definition: KpiDefinition, value: number): string {
  return definition.measure.kind === "count" ? fmtThousands(value) : fmtPct(value);
}
