// Session state holder for the retry engine
// No transition tables - the engine owns the rules

import { FailoverStates } from "../types/failover";
import type { FailoverState, StateTransition } from "../types/failover";

export { FailoverStates };
export type { FailoverState, StateTransition };

/**
 * Current state of one session plus the transitions that led there.
 * Listeners see every change; their errors never reach the session.
 */
export class StateMachine {
  private state: FailoverState = FailoverStates.SELECTING;
  private readonly history: StateTransition[] = [];
  private readonly listeners = new Set<(state: FailoverState) => void>();

  /**
   * Move to `next`. Staying in the current state records nothing.
   */
  transition(next: FailoverState): void {
    if (this.state === next) return;
    this.history.push({ from: this.state, to: next, timestamp: Date.now() });
    this.state = next;
    this.notify();
  }

  get(): FailoverState {
    return this.state;
  }

  /**
   * Copy of the transitions so far, oldest first
   */
  getHistory(): StateTransition[] {
    return [...this.history];
  }

  subscribe(listener: (state: FailoverState) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch {
        // Listener errors never affect the session
      }
    }
  }
}

export function createStateMachine(): StateMachine {
  return new StateMachine();
}
