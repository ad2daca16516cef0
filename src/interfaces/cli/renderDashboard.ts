#!/usr/bin/env node
import path from "path";
import { loadActionsFromCsv } from "../../data/csv/CsvActionLoader";
import { createDashboardSession, initializeDashboardData } from "../../services/DashboardService";
import { isValidMonth } from "../../utils/time";
import { formatTableReport } from "./formatReport";

export interface CliArgs {
  format: "table" | "json";
  employee?: string;
  kpi?: string;
  tab?: string;
  actions?: string;
  month?: string;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { format: "table", help: false };

  for (let i = 2; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--help") {
      args.help = true;
      continue;
    }

    const value = argv[++i];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}`);
    }

    switch (flag) {
      case "--employee":
        args.employee = value;
        break;
      case "--kpi":
        args.kpi = value;
        break;
      case "--tab":
        args.tab = value;
        break;
      case "--actions":
        args.actions = value;
        break;
      case "--month":
        if (!isValidMonth(value)) {
          throw new Error(`Invalid month (expected YYYY-MM): ${value}`);
        }
        args.month = value;
        break;
      case "--format":
        if (value !== "table" && value !== "json") {
          throw new Error(`Invalid format: ${value}`);
        }
        args.format = value;
        break;
      default:
        throw new Error(`Unknown argument: ${flag}`);
    }
  }

  return args;
}

function printUsage(): void {
  console.log(`
Usage: funnel-lens [options]

Optional:
  --employee <name>          Filter by employee (default: All)
  --kpi <id>                 Open the details view for a KPI
                             (impressions, ctr, click_to_lead, lead_to_mql,
                              mql_to_sql, sql_to_won)
  --tab <overview|details>   Active tab (default: overview)
  --actions <path>           CSV replay file with action,value rows,
                             applied before the flags above
  --month <YYYY-MM>          Newest history month (default: current month)
  --format <table|json>      Output format (default: table)
  --help                     Show this help message

Example:
  funnel-lens --actions examples/replay.csv --format json
`);
}

function main(): void {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    printUsage();
    process.exit(2);
  }

  if (args.help) {
    printUsage();
    process.exit(0);
  }

  try {
    const data = initializeDashboardData();
    const session = createDashboardSession(data, {
      referenceDate: args.month ? `${args.month}-01` : undefined,
    });

    if (args.actions) {
      const replay = loadActionsFromCsv(path.resolve(args.actions));
      for (const err of replay.errors) {
        console.error(`  Line ${err.line}: ${err.message}`);
      }
      replay.actions.forEach(session.dispatch);
    }

    if (args.employee !== undefined) session.selectEmployee(args.employee);
    if (args.kpi !== undefined) session.clickKpiCard(args.kpi);
    if (args.tab !== undefined) session.selectTab(args.tab);

    const snapshot = session.render();
    if (args.format === "json") {
      console.log(JSON.stringify(snapshot, null, 2));
    } else {
      console.log(formatTableReport(snapshot).join("\n"));
    }
    process.exit(0);
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(2);
  }
}

if (require.main === module) {
  main();
}
