/**
 * Intent store.
 *
 * Owned by a single Intent Coordinator. Entities are immutable values;
 * updates replace the stored record.
 */

import type { CoordinationRound, Intent, IntentStatus } from "@concord/types";

export interface IntentStore {
  getIntent(id: string): Intent | undefined;
  putIntent(intent: Intent): void;
  /** Insertion order */
  listIntents(status?: IntentStatus): Intent[];
  /** Intents targeting `resourceKey`, optionally filtered by status */
  intentsForResource(resourceKey: string, status?: IntentStatus): Intent[];

  getRound(id: string): CoordinationRound | undefined;
  putRound(round: CoordinationRound): void;
  listRounds(): CoordinationRound[];
  /** Rounds over `resourceKey`, in insertion order */
  roundsForResource(resourceKey: string): CoordinationRound[];
}

export class InMemoryIntentStore implements IntentStore {
  private readonly _intents = new Map<string, Intent>();
  private readonly _rounds = new Map<string, CoordinationRound>();

  getIntent(id: string): Intent | undefined {
    return this._intents.get(id);
  }

  putIntent(intent: Intent): void {
    this._intents.set(intent.id, intent);
  }

  listIntents(status?: IntentStatus): Intent[] {
    const all = [...this._intents.values()];
    return status === undefined ? all : all.filter((i) => i.status === status);
  }

  intentsForResource(resourceKey: string, status?: IntentStatus): Intent[] {
    return this.listIntents(status).filter((i) => i.resourceKey === resourceKey);
  }

  getRound(id: string): CoordinationRound | undefined {
    return this._rounds.get(id);
  }

  putRound(round: CoordinationRound): void {
    this._rounds.set(round.id, round);
  }

  listRounds(): CoordinationRound[] {
    return [...this._rounds.values()];
  }

  roundsForResource(resourceKey: string): CoordinationRound[] {
    return this.listRounds().filter((r) => r.resourceKey === resourceKey);
  }
}
