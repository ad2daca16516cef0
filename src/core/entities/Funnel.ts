export enum FunnelStage {
  IMPRESSION = "Impression",
  CLICK = "Click",
  LEAD = "Lead",
  MQL = "MQL",
  SQL = "SQL",
  WON = "Won",
}

export const STAGE_ORDER: readonly FunnelStage[] = [
  FunnelStage.IMPRESSION,
  FunnelStage.CLICK,
  FunnelStage.LEAD,
  FunnelStage.MQL,
  FunnelStage.SQL,
  FunnelStage.WON,
] as const;

/** One count per stage, in STAGE_ORDER. Never increases from one stage to the next. */
export type FunnelCounts = readonly [number, number, number, number, number, number];

export const ALL_EMPLOYEES = "All";

export const NAMED_EMPLOYEES = ["Sofía", "Mateo", "Valentina", "Juan"] as const;

export const EMPLOYEES = [ALL_EMPLOYEES, ...NAMED_EMPLOYEES] as const;

export type NamedEmployee = (typeof NAMED_EMPLOYEES)[number];
export type Employee = (typeof EMPLOYEES)[number];

export type EmployeeBreakdown = Readonly<Record<Employee, FunnelCounts>>;

export interface StageConversion {
  fromStage: FunnelStage;
  toStage: FunnelStage;
  fromCount: number;
  toCount: number;
  rate: number;
}

export function isEmployee(value: string): value is Employee {
  return EMPLOYEES.some((employee) => employee === value);
}

export function stageIndex(stage: FunnelStage): number {
  return STAGE_ORDER.indexOf(stage);
}
