/**
 * A single ranking or re-scoring run.
 * Owned by the session coordinator; there is no process-wide active session.
 */

import { randomUUID } from 'node:crypto';
import type { SessionKind, SessionState } from '../types/models.js';
import { InvalidTransitionError } from '../errors.js';

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  COLLECTING_ITEMS: ['RANKING', 'SCORING'],
  // RANKING self-loops once per comparison; that is counted, not transitioned
  RANKING: ['SCORING', 'ABORTED'],
  SCORING: ['DONE'],
  DONE: [],
  ABORTED: [],
};

export interface SessionTransition {
  from: SessionState;
  to: SessionState;
  at: Date;
}

export class Session {
  readonly id: string;
  readonly kind: SessionKind;
  readonly startedAt: Date;
  readonly history: SessionTransition[] = [];

  private _state: SessionState = 'COLLECTING_ITEMS';
  private _comparisons = 0;

  constructor(kind: SessionKind, id: string = randomUUID()) {
    this.id = id;
    this.kind = kind;
    this.startedAt = new Date();
  }

  get state(): SessionState {
    return this._state;
  }

  get comparisons(): number {
    return this._comparisons;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this._state].length === 0;
  }

  transition(to: SessionState): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new InvalidTransitionError(this._state, to);
    }
    this.history.push({ from: this._state, to, at: new Date() });
    this._state = to;
  }

  recordComparison(): void {
    if (this._state !== 'RANKING') {
      throw new InvalidTransitionError(this._state, 'RANKING');
    }
    this._comparisons++;
  }
}
