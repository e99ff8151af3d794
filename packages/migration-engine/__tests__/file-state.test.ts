import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CheckpointPersistenceError, ConfigurationError } from '../src/errors';
import { FileCheckpointState } from '../src/file-state';
import { checkpointKey } from '../src/state';

describe('FileCheckpointState', () => {
  let tmpDir: string;
  let statePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shiftgate-state-'));
    statePath = path.join(tmpDir, 'nested', 'state.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should create an empty state file when none exists', () => {
    const state = FileCheckpointState.open(statePath);

    expect(state.path).toBe(statePath);
    expect(JSON.parse(fs.readFileSync(statePath, 'utf8'))).toEqual({ version: 1, checkpoints: [] });
  });

  it('should persist every set and reload it', () => {
    const key = checkpointKey('replica_upgrade', 'db-replica-1', 'stopped');
    const state = FileCheckpointState.open(statePath);

    state.set(key, true);
    state.markCompleted('preflight');

    expect(JSON.parse(fs.readFileSync(statePath, 'utf8'))).toEqual({
      version: 1,
      checkpoints: [
        { scope: 'replica_upgrade', entity: 'db-replica-1', field: 'stopped', value: true },
        { scope: 'workflow', entity: 'preflight', field: 'completed', value: true },
      ],
    });

    const reloaded = FileCheckpointState.open(statePath);
    expect(reloaded.get(key)).toBe(true);
    expect(reloaded.isCompleted('preflight')).toBe(true);
    expect(reloaded.isCompleted('promote')).toBe(false);
  });

  it('should treat an empty file as empty state', () => {
    fs.mkdirSync(path.dirname(statePath), { recursive: true });
    fs.writeFileSync(statePath, '');

    expect(FileCheckpointState.open(statePath).toDocument().checkpoints).toEqual([]);
  });

  it('should reject a blank path', () => {
    expect(() => FileCheckpointState.open(' ')).toThrow('state path is required');
  });

  it('should reject an unreadable state path', () => {
    expect(() => FileCheckpointState.open(tmpDir)).toThrow(ConfigurationError);
    expect(() => FileCheckpointState.open(tmpDir)).toThrow(`cannot read state file ${tmpDir}: EISDIR`);
  });

  it('should reject malformed documents', () => {
    fs.mkdirSync(path.dirname(statePath), { recursive: true });

    fs.writeFileSync(statePath, '{not json');
    expect(() => FileCheckpointState.open(statePath)).toThrow(ConfigurationError);

    fs.writeFileSync(statePath, JSON.stringify({ version: 2, checkpoints: [] }));
    expect(() => FileCheckpointState.open(statePath)).toThrow(`state file ${statePath} is invalid`);
  });

  it('should roll back memory when persisting fails', () => {
    const state = FileCheckpointState.open(statePath);
    const key = checkpointKey('replica_upgrade', 'db-replica-1', 'upgraded');

    // a directory where the temp file should go makes the write fail
    fs.mkdirSync(`${statePath}.tmp`);

    expect(() => state.set(key, true)).toThrow(CheckpointPersistenceError);
    expect(state.get(key)).toBeUndefined();
  });
});
