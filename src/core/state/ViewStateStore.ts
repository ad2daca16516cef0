import {
  ALL_EMPLOYEES,
  DashboardTab,
  Employee,
  INITIAL_VIEW_STATE,
  isDashboardTab,
  isEmployee,
  isKpiId,
  KpiId,
  ViewState,
} from "../entities";

export type ViewAction =
  | { type: "selectEmployee"; employee: string }
  | { type: "selectTab"; tab: string }
  | { type: "clickKpiCard"; kpi: string };

export type ViewStateListener = (state: ViewState, previous: ViewState, action: ViewAction) => void;

export interface ViewStateStore {
  getState(): ViewState;
  dispatch(action: ViewAction): void;
  selectEmployee(employee: string): void;
  selectTab(tab: string): void;
  clickKpiCard(kpi: string): void;
  /** Returns an unsubscribe function. */
  subscribe(listener: ViewStateListener): () => void;
}

export function resolveEmployee(value: string): Employee {
  return isEmployee(value) ? value : ALL_EMPLOYEES;
}

export function resolveKpi(value: string): KpiId {
  return isKpiId(value) ? value : KpiId.IMPRESSIONS;
}

export function resolveTab(value: string): DashboardTab {
  return isDashboardTab(value) ? value : DashboardTab.OVERVIEW;
}

export function reduceViewState(state: ViewState, action: ViewAction): ViewState {
  switch (action.type) {
    case "selectEmployee":
      return Object.freeze({ ...state, employee: resolveEmployee(action.employee) });
    case "selectTab":
      return Object.freeze({ ...state, tab: resolveTab(action.tab) });
    case "clickKpiCard":
      return Object.freeze({ ...state, kpi: resolveKpi(action.kpi), tab: DashboardTab.DETAILS });
  }
}

/**
 * Holds one session's ViewState. Actions dispatched while listeners are being
 * notified are queued and applied once the current notification finishes, so
 * every listener sees each transition exactly once and in order.
 *
 * A throwing listener does not stop the others or the queue: every queued
 * action is still applied and notified, then the first error is rethrown from
 * the outermost `dispatch`.
 */
export function createViewStateStore(initial: ViewState = INITIAL_VIEW_STATE): ViewStateStore {
  let state = Object.freeze({ ...initial });
  const listeners = new Set<ViewStateListener>();
  const pending: ViewAction[] = [];
  let dispatching = false;

  function dispatch(action: ViewAction): void {
    pending.push(action);
    if (dispatching) return;

    dispatching = true;
    const failures: unknown[] = [];
    let next = pending.shift();
    while (next !== undefined) {
      const previous = state;
      state = reduceViewState(previous, next);
      for (const listener of [...listeners]) {
        try {
          listener(state, previous, next);
        } catch (err: unknown) {
          failures.push(err);
        }
      }
      next = pending.shift();
    }
    dispatching = false;

    if (failures.length > 0) {
      throw failures[0];
    }
  }

  function subscribe(listener: ViewStateListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  return {
    getState: () => state,
    dispatch,
    selectEmployee: (employee) => dispatch({ type: "selectEmployee", employee }),
    selectTab: (tab) => dispatch({ type: "selectTab", tab }),
    clickKpiCard: (kpi) => dispatch({ type: "clickKpiCard", kpi }),
    subscribe,
  };
}
