export * from "./Funnel";
export * from "./Kpi";
export * from "./History";
export * from "./ViewState";
