// tests/unit/CheckpointStore.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { CheckpointStore } from '../../src/core/checkpoint/CheckpointStore';
import { Logger } from '../../src/observability/Logger';
import { CheckpointError } from '../../src/utils/errors';
import { makeTempDir, removeDir } from '../helpers/fixtures';

describe('CheckpointStore', () => {
  const logger = new Logger({ silent: true });
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTempDir();
    file = path.join(dir, 'checkpoint.json');
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  it('starts empty when the file does not exist', () => {
    const store = new CheckpointStore(file, logger);
    store.load();

    expect(store.progress('DEMO')).toBe(0);
    expect(store.snapshot()).toEqual({});
    expect(fs.existsSync(file)).toBe(false);
  });

  it('rewrites the whole file on every advance', () => {
    const store = new CheckpointStore(file, logger);
    store.load();

    store.advance('DEMO', 50);
    store.advance('OTHER', 10);
    store.advance('DEMO', 100);

    expect(fs.readFileSync(file, 'utf-8')).toBe(
      JSON.stringify({ projects: { DEMO: 100, OTHER: 10 } }, null, 2)
    );
  });

  it('loads offsets written by a previous run', () => {
    fs.writeFileSync(file, JSON.stringify({ projects: { DEMO: 150, OTHER: 3 } }));

    const store = new CheckpointStore(file, logger);
    store.load();

    expect(store.progress('DEMO')).toBe(150);
    expect(store.progress('OTHER')).toBe(3);
    expect(store.progress('MISSING')).toBe(0);
  });

  it('starts empty with a warning when the file is not JSON', () => {
    fs.writeFileSync(file, '{"projects": {"DEMO": 4');
    const warn = vi.spyOn(logger, 'warn');

    const store = new CheckpointStore(file, logger);
    store.load();

    expect(store.snapshot()).toEqual({});
    expect(warn).toHaveBeenCalledWith(
      'Checkpoint file unreadable, starting fresh',
      expect.objectContaining({ file })
    );
  });

  it('starts empty with a warning when the file has the wrong shape', () => {
    fs.writeFileSync(file, JSON.stringify({ projects: { DEMO: -1 } }));
    const warn = vi.spyOn(logger, 'warn');

    const store = new CheckpointStore(file, logger);
    store.load();

    expect(store.progress('DEMO')).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rejects an offset that moves backwards', () => {
    const store = new CheckpointStore(file, logger);
    store.load();
    store.advance('DEMO', 100);

    expect(() => store.advance('DEMO', 50)).toThrow(CheckpointError);
    expect(store.progress('DEMO')).toBe(100);
  });

  it('accepts the same offset again', () => {
    const store = new CheckpointStore(file, logger);
    store.load();
    store.advance('DEMO', 100);

    expect(() => store.advance('DEMO', 100)).not.toThrow();
  });

  it('rejects negative and fractional offsets', () => {
    const store = new CheckpointStore(file, logger);

    expect(() => store.advance('DEMO', -1)).toThrow(CheckpointError);
    expect(() => store.advance('DEMO', 1.5)).toThrow(CheckpointError);
  });

  it('resets a single project', () => {
    const store = new CheckpointStore(file, logger);
    store.load();
    store.advance('DEMO', 100);
    store.advance('OTHER', 20);

    store.reset('DEMO');

    expect(store.progress('DEMO')).toBe(0);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({ projects: { OTHER: 20 } });
  });

  it('creates missing parent directories', () => {
    const nested = path.join(dir, 'state', 'run', 'checkpoint.json');
    const store = new CheckpointStore(nested, logger);

    store.advance('DEMO', 1);

    expect(JSON.parse(fs.readFileSync(nested, 'utf-8'))).toEqual({ projects: { DEMO: 1 } });
  });

  it('returns a snapshot detached from later updates', () => {
    const store = new CheckpointStore(file, logger);
    store.advance('DEMO', 5);

    const snapshot = store.snapshot();
    store.advance('DEMO', 9);

    expect(snapshot).toEqual({ DEMO: 5 });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('wraps write failures in CheckpointError', () => {
    // A directory where the file should be
    fs.mkdirSync(file);
    const store = new CheckpointStore(file, logger);

    expect(() => store.advance('DEMO', 1)).toThrow(CheckpointError);
  });
});
