import fs from "fs";
import { parse } from "csv-parse/sync";
import { ViewAction } from "../../core/state/ViewStateStore";

export interface LoaderError {
  line: number;
  message: string;
}

export interface ActionLoaderResult {
  actions: ViewAction[];
  errors: LoaderError[];
}

const ACTION_BUILDERS: Record<string, (value: string) => ViewAction> = {
  employee: (employee) => ({ type: "selectEmployee", employee }),
  kpi: (kpi) => ({ type: "clickKpiCard", kpi }),
  tab: (tab) => ({ type: "selectTab", tab }),
};

/**
 * Reads a replay script with `action,value` columns. Selector values are not
 * checked here; the store falls back to its defaults for unknown ones.
 */
export function loadActionsFromCsv(filePath: string): ActionLoaderResult {
  const content = fs.readFileSync(filePath, "utf-8");
  const records = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as Record<string, string>[];

  const actions: ViewAction[] = [];
  const errors: LoaderError[] = [];

  for (let i = 0; i < records.length; i++) {
    const row = records[i];
    const lineNum = i + 2;

    if (!row.action || !row.value) {
      errors.push({ line: lineNum, message: "Missing required field(s)" });
      continue;
    }

    const build = ACTION_BUILDERS[row.action.toLowerCase()];
    if (!build) {
      errors.push({ line: lineNum, message: `Invalid action: ${row.action}` });
      continue;
    }

    actions.push(build(row.value));
  }

  return { actions, errors };
}
