/**
 * File-backed Checkpoint State
 *
 * Persists every checkpoint to a JSON document synchronously on each `set` and
 * `markCompleted`, so terminating the process right after a phase completes
 * never loses that checkpoint.
 *
 * Document format:
 * ```json
 * {
 *   "version": 1,
 *   "checkpoints": [
 *     { "scope": "replica_upgrade", "entity": "replica-1", "field": "stopped", "value": true },
 *     { "scope": "workflow", "entity": "preflight", "field": "completed", "value": true }
 *   ]
 * }
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, CheckpointPersistenceError, errorMessage } from './errors';
import {
  CheckpointEntry,
  CheckpointKey,
  CheckpointState,
  CheckpointValue,
  MemoryCheckpointState,
  readFlag,
  stepCompletedKey,
} from './state';

export const STATE_FILE_VERSION = 1;

const CheckpointValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const StateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  checkpoints: z.array(
    z.object({
      scope: z.string().min(1),
      entity: z.string(),
      field: z.string().min(1),
      value: CheckpointValueSchema,
    })
  ),
});

export type StateFileDocument = z.infer<typeof StateFileSchema>;

export class FileCheckpointState implements CheckpointState {
  private readonly memory: MemoryCheckpointState;

  private constructor(private readonly filePath: string, entries: CheckpointEntry[]) {
    this.memory = new MemoryCheckpointState(entries);
  }

  /**
   * Load state from `filePath`, creating an empty state file when none exists
   *
   * @throws ConfigurationError if the path is blank, unreadable or not a valid state document
   * @throws CheckpointPersistenceError if the initial file cannot be written
   */
  static open(filePath: string): FileCheckpointState {
    if (!filePath || filePath.trim() === '') {
      throw new ConfigurationError('state path is required');
    }

    if (!fs.existsSync(filePath)) {
      const state = new FileCheckpointState(filePath, []);
      state.persist();
      return state;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`cannot read state file ${filePath}: ${errorMessage(error)}`);
    }
    if (raw.trim().length === 0) {
      return new FileCheckpointState(filePath, []);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`state file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const result = StateFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`);
      throw new ConfigurationError(`state file ${filePath} is invalid: ${issues.join('; ')}`);
    }

    const entries = result.data.checkpoints.map((c) => ({
      key: { scope: c.scope, entity: c.entity, field: c.field },
      value: c.value,
    }));
    return new FileCheckpointState(filePath, entries);
  }

  get path(): string {
    return this.filePath;
  }

  get(key: CheckpointKey): CheckpointValue | undefined {
    return this.memory.get(key);
  }

  /**
   * @throws CheckpointPersistenceError if the document cannot be written; the
   * in-memory value is rolled back so memory and disk stay in agreement
   */
  set(key: CheckpointKey, value: CheckpointValue): void {
    const previous = this.memory.get(key);
    this.memory.set(key, value);
    try {
      this.persist();
    } catch (error) {
      if (previous === undefined) {
        this.memory.delete(key);
      } else {
        this.memory.set(key, previous);
      }
      throw error;
    }
  }

  markCompleted(stepName: string): void {
    this.set(stepCompletedKey(stepName), true);
  }

  isCompleted(stepName: string): boolean {
    return readFlag(this.memory, stepCompletedKey(stepName));
  }

  toDocument(): StateFileDocument {
    return {
      version: STATE_FILE_VERSION,
      checkpoints: this.memory.entries().map((e) => ({
        scope: e.key.scope,
        entity: e.key.entity,
        field: e.key.field,
        value: e.value,
      })),
    };
  }

  private persist(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpPath, JSON.stringify(this.toDocument(), null, 2) + '\n', 'utf8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      throw new CheckpointPersistenceError(this.filePath, error);
    }
  }
}
