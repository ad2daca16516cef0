import { FunnelStage } from "./Funnel";

export enum KpiId {
  IMPRESSIONS = "impressions",
  CTR = "ctr",
  CLICK_TO_LEAD = "click_to_lead",
  LEAD_TO_MQL = "lead_to_mql",
  MQL_TO_SQL = "mql_to_sql",
  SQL_TO_WON = "sql_to_won",
}

export type RateKpiId = Exclude<KpiId, KpiId.IMPRESSIONS>;

export const KPI_ORDER: readonly KpiId[] = [
  KpiId.IMPRESSIONS,
  KpiId.CTR,
  KpiId.CLICK_TO_LEAD,
  KpiId.LEAD_TO_MQL,
  KpiId.MQL_TO_SQL,
  KpiId.SQL_TO_WON,
] as const;

/** Enumeration order used for ranking and tie-breaks. */
export const RATE_KPI_ORDER: readonly RateKpiId[] = [
  KpiId.CTR,
  KpiId.CLICK_TO_LEAD,
  KpiId.LEAD_TO_MQL,
  KpiId.MQL_TO_SQL,
  KpiId.SQL_TO_WON,
] as const;

export type KpiMeasure =
  | { kind: "count"; stage: FunnelStage }
  | { kind: "rate"; numerator: FunnelStage; denominator: FunnelStage };

export interface KpiDefinition {
  id: KpiId;
  title: string;
  help: string;
  subtitle: string;
  explanation: string;
  measure: KpiMeasure;
}

export const KPI_DEFINITIONS: Readonly<Record<KpiId, KpiDefinition>> = {
  [KpiId.IMPRESSIONS]: {
    id: KpiId.IMPRESSIONS,
    title: "Impressions",
    help: "Total times the ad or content was shown. Base of the funnel.",
    subtitle: "Funnel base",
    explanation: "Total impressions per month.",
    measure: { kind: "count", stage: FunnelStage.IMPRESSION },
  },
  [KpiId.CTR]: {
    id: KpiId.CTR,
    title: "CTR",
    help: "Click-Through Rate = Clicks / Impressions. Measures how compelling the creative and copy are.",
    subtitle: "Click / Impression",
    explanation: "Clicks / Impressions (%).",
    measure: { kind: "rate", numerator: FunnelStage.CLICK, denominator: FunnelStage.IMPRESSION },
  },
  [KpiId.CLICK_TO_LEAD]: {
    id: KpiId.CLICK_TO_LEAD,
    title: "Click → Lead",
    help: "Leads / Clicks. Measures the landing page, form friction and the offer.",
    subtitle: "Lead / Click",
    explanation: "Leads / Clicks (%).",
    measure: { kind: "rate", numerator: FunnelStage.LEAD, denominator: FunnelStage.CLICK },
  },
  [KpiId.LEAD_TO_MQL]: {
    id: KpiId.LEAD_TO_MQL,
    title: "Lead → MQL",
    help: "MQL / Leads. Measures lead quality and marketing scoring.",
    subtitle: "MQL / Lead",
    explanation: "MQL / Leads (%).",
    measure: { kind: "rate", numerator: FunnelStage.MQL, denominator: FunnelStage.LEAD },
  },
  [KpiId.MQL_TO_SQL]: {
    id: KpiId.MQL_TO_SQL,
    title: "MQL → SQL",
    help: "SQL / MQL. Measures marketing and sales alignment and the qualification process.",
    subtitle: "SQL / MQL",
    explanation: "SQL / MQL (%).",
    measure: { kind: "rate", numerator: FunnelStage.SQL, denominator: FunnelStage.MQL },
  },
  [KpiId.SQL_TO_WON]: {
    id: KpiId.SQL_TO_WON,
    title: "SQL → Won",
    help: "Won / SQL. Measures final close rate of the sales pipeline.",
    subtitle: "Won / SQL",
    explanation: "Won / SQL (%).",
    measure: { kind: "rate", numerator: FunnelStage.WON, denominator: FunnelStage.SQL },
  },
};

export type KpiRates = Readonly<Record<RateKpiId, number>>;

export function isKpiId(value: string): value is KpiId {
  return KPI_ORDER.some((kpi) => kpi === value);
}
