/**
 * Checkpoint State
 *
 * Durable markers for actions and steps that already completed. Keys are
 * composite (scope, entity, field) rather than delimiter-joined strings, so an
 * entity name containing ':' can never collide with another key.
 *
 * One state instance is owned by one orchestration run. Runs sharing a store
 * are not coordinated: the last writer wins.
 */

import { CHECKPOINT_SCOPES } from './constants';

export type CheckpointValue = string | number | boolean | null;

export interface CheckpointKey {
  readonly scope: string;
  readonly entity: string;
  readonly field: string;
}

export interface CheckpointEntry {
  key: CheckpointKey;
  value: CheckpointValue;
}

export interface CheckpointState {
  /**
   * @returns the stored value, or undefined when the key was never set
   */
  get(key: CheckpointKey): CheckpointValue | undefined;
  set(key: CheckpointKey, value: CheckpointValue): void;
  markCompleted(stepName: string): void;
  isCompleted(stepName: string): boolean;
}

export function checkpointKey(scope: string, entity: string, field: string): CheckpointKey {
  return Object.freeze({ scope, entity, field });
}

/**
 * Canonical string form used for indexing and on-disk storage.
 * JSON array encoding keeps the three parts unambiguous.
 */
export function encodeCheckpointKey(key: CheckpointKey): string {
  return JSON.stringify([key.scope, key.entity, key.field]);
}

export function stepCompletedKey(stepName: string): CheckpointKey {
  return checkpointKey(CHECKPOINT_SCOPES.WORKFLOW, stepName, 'completed');
}

/**
 * Read a boolean checkpoint. Anything other than a stored `true` reads as false.
 */
export function readFlag(state: CheckpointState, key: CheckpointKey): boolean {
  return state.get(key) === true;
}

/**
 * In-memory checkpoint state for local runs and tests
 */
export class MemoryCheckpointState implements CheckpointState {
  private readonly values = new Map<string, CheckpointEntry>();
  private readonly completed = new Set<string>();

  constructor(initial: CheckpointEntry[] = [], completedSteps: string[] = []) {
    for (const entry of initial) {
      this.set(entry.key, entry.value);
    }
    for (const step of completedSteps) {
      this.completed.add(step);
    }
  }

  get(key: CheckpointKey): CheckpointValue | undefined {
    return this.values.get(encodeCheckpointKey(key))?.value;
  }

  set(key: CheckpointKey, value: CheckpointValue): void {
    this.values.set(encodeCheckpointKey(key), {
      key: checkpointKey(key.scope, key.entity, key.field),
      value,
    });
  }

  delete(key: CheckpointKey): boolean {
    return this.values.delete(encodeCheckpointKey(key));
  }

  markCompleted(stepName: string): void {
    this.completed.add(stepName);
  }

  isCompleted(stepName: string): boolean {
    return this.completed.has(stepName);
  }

  entries(): CheckpointEntry[] {
    return [...this.values.values()].map((e) => ({ key: e.key, value: e.value }));
  }

  completedSteps(): string[] {
    return [...this.completed];
  }
}
