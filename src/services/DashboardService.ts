import {
  Employee,
  EmployeeBreakdown,
  FunnelCounts,
  MonthlyKpiRow,
  ViewState,
} from "../core/entities";
import {
  DEFAULT_BASE_SEED,
  DEFAULT_SPLIT_SEED,
  deriveHistorySeed,
  generateBaseFunnel,
  generateMonthlyHistory,
  GeneratorConfig,
  splitByEmployee,
} from "../core/engine/SyntheticDataGenerator";
import {
  createViewStateStore,
  ViewAction,
  ViewStateListener,
} from "../core/state/ViewStateStore";
import { DashboardView, projectDashboard } from "../interfaces/view/DashboardProjector";
import { DateInput, now, trailingMonths } from "../utils/time";

export interface DashboardDataConfig {
  baseSeed: number;
  splitSeed: number;
  generatorConfig?: Partial<GeneratorConfig>;
}

export const DEFAULT_DASHBOARD_DATA_CONFIG: DashboardDataConfig = {
  baseSeed: DEFAULT_BASE_SEED,
  splitSeed: DEFAULT_SPLIT_SEED,
};

/** Generated once per process and shared read-only by every session. */
export interface DashboardData {
  readonly baseCounts: FunnelCounts;
  readonly breakdown: EmployeeBreakdown;
  readonly generatorConfig?: Partial<GeneratorConfig>;
}

export interface DashboardSessionOptions {
  initialState?: ViewState;
  /** Any date inside the newest history month. Defaults to the time of each render. */
  referenceDate?: DateInput;
}

export interface DashboardSnapshot {
  view: DashboardView;
  metadata: {
    historySeed: number;
    generatedAt: string;
    renderTimeMs: number;
  };
}

export interface DashboardSession {
  readonly data: DashboardData;
  getState(): ViewState;
  dispatch(action: ViewAction): void;
  selectEmployee(employee: string): void;
  selectTab(tab: string): void;
  clickKpiCard(kpi: string): void;
  subscribe(listener: ViewStateListener): () => void;
  getHistory(employee: Employee): readonly MonthlyKpiRow[];
  render(): DashboardSnapshot;
}

export function initializeDashboardData(config?: Partial<DashboardDataConfig>): DashboardData {
  const cfg = { ...DEFAULT_DASHBOARD_DATA_CONFIG, ...config };
  const baseCounts = generateBaseFunnel(cfg.baseSeed, cfg.generatorConfig);
  const breakdown = splitByEmployee(baseCounts, cfg.splitSeed, cfg.generatorConfig);

  return deepFreeze({ baseCounts, breakdown, generatorConfig: structuredClone(cfg.generatorConfig) });
}

export function createDashboardSession(
  data: DashboardData,
  options: DashboardSessionOptions = {}
): DashboardSession {
  const store = createViewStateStore(options.initialState);
  const historyCache = new Map<string, readonly MonthlyKpiRow[]>();

  function getHistory(employee: Employee): readonly MonthlyKpiRow[] {
    const seed = deriveHistorySeed(employee);
    const [month] = trailingMonths(1, options.referenceDate);
    const key = `${employee}|${seed}|${month}`;
    const cached = historyCache.get(key);
    if (cached) return cached;

    const history = deepFreeze(
      generateMonthlyHistory(data.breakdown[employee], seed, {
        referenceDate: `${month}-01`,
        config: data.generatorConfig,
      })
    );
    historyCache.set(key, history);
    return history;
  }

  function render(): DashboardSnapshot {
    const startTime = Date.now();
    const state = store.getState();
    const view = projectDashboard(state, data.breakdown, getHistory(state.employee));

    return {
      view,
      metadata: {
        historySeed: deriveHistorySeed(state.employee),
        generatedAt: now(),
        renderTimeMs: Date.now() - startTime,
      },
    };
  }

  return {
    data,
    getState: store.getState,
    dispatch: store.dispatch,
    selectEmployee: store.selectEmployee,
    selectTab: store.selectTab,
    clickKpiCard: store.clickKpiCard,
    subscribe: store.subscribe,
    getHistory,
    render,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
