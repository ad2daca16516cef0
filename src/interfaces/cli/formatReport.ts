import { DashboardTab } from "../../core/entities";
import { DashboardSnapshot } from "../../services/DashboardService";

const WIDTH = 56;

export function formatTableReport(snapshot: DashboardSnapshot): string[] {
  const { view, metadata } = snapshot;
  const line = "=".repeat(WIDTH);
  const divider = "-".repeat(WIDTH);
  const marker = (tab: DashboardTab) => (view.activeTab === tab ? " [active]" : "");
  const out: string[] = [];

  out.push(line);
  out.push(" MARKETING FUNNEL - Dashboard");
  out.push(` Generated: ${metadata.generatedAt}`);
  out.push(line);
  out.push(`  Employee:     ${view.state.employee}`);
  out.push(`  Selected KPI: ${view.details.title}`);
  out.push(`  History seed: ${metadata.historySeed}`);

  out.push("");
  out.push(divider);
  out.push(`OVERVIEW${marker(DashboardTab.OVERVIEW)}`);
  out.push("");
  out.push("  OBJECTIVES:");
  for (const objective of view.overview.objectives) {
    out.push(`    - ${objective}`);
  }

  out.push("");
  out.push("  FUNNEL:");
  const stageWidth = Math.max(...view.overview.funnel.map((bar) => bar.stage.length));
  for (const bar of view.overview.funnel) {
    out.push(`    ${bar.stage.padEnd(stageWidth)}  ${bar.label}`);
  }

  out.push("");
  out.push("  KPIS:");
  const titleWidth = Math.max(...view.overview.cards.map((card) => card.title.length));
  for (const card of view.overview.cards) {
    const pointer = card.selected ? "*" : " ";
    out.push(`  ${pointer} ${card.title.padEnd(titleWidth)}  ${card.value.padStart(10)}  (${card.subtitle})`);
  }

  const { insights } = view.overview;
  out.push("");
  out.push("  INSIGHTS:");
  out.push(`    Biggest drop: ${insights.worst.text}`);
  out.push(`    Best stage:   ${insights.best.text}`);
  out.push(`    Won total:    ${insights.wonTotal}`);
  out.push(`    ${insights.tip}`);

  out.push("");
  out.push(divider);
  out.push(`DETAILS${marker(DashboardTab.DETAILS)}`);
  out.push(`  ${view.details.title} · last ${view.details.trend.length} months`);
  out.push(`  ${view.details.description}`);
  out.push("");
  const [monthHeader, valueHeader] = view.details.table.header;
  out.push(`    ${monthHeader.padEnd(8)}  ${valueHeader}`);
  for (const [month, value] of view.details.table.rows) {
    out.push(`    ${month.padEnd(8)}  ${value}`);
  }

  out.push("");
  out.push(line);
  out.push("END OF REPORT");
  out.push(line);
  return out;
}
