export const FAILURE_THRESHOLD = 10;

export type CircuitState =
  | { readonly kind: 'active'; readonly failures: number }
  | { readonly kind: 'disabled'; readonly failures: number };

export const INITIAL_CIRCUIT: CircuitState = { kind: 'active', failures: 0 };

export function recordSuccess(state: CircuitState): CircuitState {
  if (state.kind === 'disabled') return state;
  return state.failures === 0 ? state : INITIAL_CIRCUIT;
}

// Disabled is terminal: nothing moves the circuit out of it.
export function recordFailure(state: CircuitState, threshold = FAILURE_THRESHOLD): CircuitState {
  if (state.kind === 'disabled') return state;
  const failures = state.failures + 1;
  return failures >= threshold ? { kind: 'disabled', failures } : { kind: 'active', failures };
}

export function isDisabled(state: CircuitState): boolean {
  return state.kind === 'disabled';
}
