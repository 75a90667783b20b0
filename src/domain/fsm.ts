/**
 * Order and payment lifecycles as explicit transition tables.
 *
 * | FSM | Transitions |
 * |-----|-------------|
 * | order | PENDING → CONFIRMED, CANCELED; CONFIRMED → CANCELED |
 * | payment | PENDING → CONFIRMED, FAILED |
 *
 * @example
 * ```typescript
 * orderFSM.assertTransition(order.status, "CONFIRMED"); // throws InvalidStateTransitionError
 * if (orderFSM.isTerminal(order.status)) {
 *   // nothing left to do
 * }
 * ```
 */
import type { OrderStatus, PaymentStatus } from "../types/db";
import { InvalidStateTransitionError } from "../utils/errors";

export interface FSMDefinition<TState extends string> {
  /** Status of a newly created entity */
  initial: TState;
  /** Allowed targets per state; an empty list marks a terminal state */
  transitions: Record<TState, readonly TState[]>;
}

export interface FSM<TState extends string> {
  readonly name: string;
  readonly definition: FSMDefinition<TState>;
  readonly initial: TState;
  canTransition(from: TState, to: TState): boolean;
  /** @throws InvalidStateTransitionError */
  assertTransition(from: TState, to: TState): void;
  validTransitions(from: TState): readonly TState[];
  isTerminal(state: TState): boolean;
  isValidState(state: string): state is TState;
}

export function defineFSM<TState extends string>(
  name: string,
  definition: FSMDefinition<TState>
): FSM<TState> {
  const validStates = new Set<string>(Object.keys(definition.transitions));

  return {
    name,
    definition,
    initial: definition.initial,

    canTransition(from: TState, to: TState): boolean {
      return definition.transitions[from]?.includes(to) ?? false;
    },

    assertTransition(from: TState, to: TState): void {
      const allowed = definition.transitions[from] ?? [];
      if (!allowed.includes(to)) {
        const valid = allowed.length > 0 ? allowed.join(", ") : "none, terminal state";
        throw new InvalidStateTransitionError(
          `Cannot move ${name} from ${from} to ${to}. Valid transitions: ${valid}`,
          from,
          to
        );
      }
    },

    validTransitions(from: TState): readonly TState[] {
      return definition.transitions[from] ?? [];
    },

    isTerminal(state: TState): boolean {
      const allowed = definition.transitions[state];
      return !allowed || allowed.length === 0;
    },

    isValidState(state: string): state is TState {
      return validStates.has(state);
    },
  };
}

export const orderFSM = defineFSM<OrderStatus>("order", {
  initial: "PENDING",
  transitions: {
    PENDING: ["CONFIRMED", "CANCELED"],
    CONFIRMED: ["CANCELED"],
    CANCELED: [],
  },
});

export const paymentFSM = defineFSM<PaymentStatus>("payment", {
  initial: "PENDING",
  transitions: {
    PENDING: ["CONFIRMED", "FAILED"],
    CONFIRMED: [],
    FAILED: [],
  },
});
