import type { DisputeActionKind } from "./types";

export type DisputeState = "clean" | "disputed" | "charged_back";

const TRANSITIONS: Record<DisputeState, DisputeState[]> = {
  clean: ["disputed"],
  disputed: ["clean", "charged_back"],
  charged_back: [],
};

/** State each dispute action moves a history entry into. */
export const ACTION_TARGETS: Record<DisputeActionKind, DisputeState> = {
  dispute: "disputed",
  resolve: "clean",
  chargeback: "charged_back",
};

export const TERMINAL_STATES: DisputeState[] = ["charged_back"];

export function canTransition(from: DisputeState, to: DisputeState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Target state for `action`, or null when the entry's current state does not allow it. */
export function nextDisputeState(
  from: DisputeState,
  action: DisputeActionKind,
): DisputeState | null {
  const to = ACTION_TARGETS[action];
  return canTransition(from, to) ? to : null;
}

export function getValidTransitions(state: DisputeState): DisputeState[] {
  return [...TRANSITIONS[state]];
}
