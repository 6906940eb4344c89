/**
 * Session state rules.
 *
 * A rule maps (state, accepted move) to the next state. Rules must be
 * deterministic: every peer applies them independently and compares
 * digests.
 */

import type { JsonObject, Move } from "@concord/types";

export type StateRule = (state: JsonObject, move: Move) => JsonObject;

/**
 * Records who moved last and counts turns.
 */
export const turnBasedRule: StateRule = (state, move) => {
  const previous = state.turnCount;
  return {
    ...state,
    lastActor: move.originator,
    turnCount: (typeof previous === "number" ? previous : 0) + 1,
  };
};

export const BUILTIN_STATE_RULES: Readonly<Record<string, StateRule>> = {
  turn_based: turnBasedRule,
};

/**
 * Session type → rule. Types without a rule keep their state unchanged.
 */
export class StateRuleRegistry {
  private readonly rules = new Map<string, StateRule>();

  constructor(custom: Readonly<Record<string, StateRule>> = {}) {
    for (const [type, rule] of Object.entries({ ...BUILTIN_STATE_RULES, ...custom })) {
      this.rules.set(type, rule);
    }
  }

  has(type: string): boolean {
    return this.rules.has(type);
  }

  apply(type: string, state: JsonObject, move: Move): JsonObject {
    const rule = this.rules.get(type);
    return rule === undefined ? state : rule(state, move);
  }
}
