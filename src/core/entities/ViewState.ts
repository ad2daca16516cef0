import { ALL_EMPLOYEES, Employee } from "./Funnel";
import { KpiId } from "./Kpi";

export enum DashboardTab {
  OVERVIEW = "overview",
  DETAILS = "details",
}

export interface ViewState {
  readonly employee: Employee;
  readonly kpi: KpiId;
  readonly tab: DashboardTab;
}

export const INITIAL_VIEW_STATE: ViewState = Object.freeze({
  employee: ALL_EMPLOYEES,
  kpi: KpiId.IMPRESSIONS,
  tab: DashboardTab.OVERVIEW,
});

export function isDashboardTab(value: string): value is DashboardTab {
  return value === DashboardTab.OVERVIEW || value === DashboardTab.DETAILS;
}
