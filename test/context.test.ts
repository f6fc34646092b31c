import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/env.js';
import { createAppContext } from '../src/context.js';
import { IndexLoadError } from '../src/errors.js';
import { silentLogger } from './helpers.js';

describe('createAppContext', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-context-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function context(indexPath: string) {
    return createAppContext(loadConfig({ OPENAI_API_KEY: 'test-key', INDEX_PATH: indexPath }), silentLogger);
  }

  it('does not overwrite an unreadable index file on close', async () => {
    const indexPath = path.join(dir, 'index.json');
    await fs.writeFile(indexPath, '{"format":"broken"', 'utf8');
    const ctx = context(indexPath);

    await expect(ctx.service.loadIndex()).rejects.toBeInstanceOf(IndexLoadError);
    await ctx.close();
    await ctx.close();

    expect(await fs.readFile(indexPath, 'utf8')).toBe('{"format":"broken"');
  });

  it('persists the index on close after a clean start', async () => {
    const indexPath = path.join(dir, 'index.json');
    const ctx = context(indexPath);

    expect(await ctx.service.loadIndex()).toMatchObject({ loaded: false });
    await ctx.close();

    const saved: unknown = JSON.parse(await fs.readFile(indexPath, 'utf8'));
    expect(saved).toMatchObject({ format: 'pdf-rag-core/vector-index', version: 1, count: 0, entries: [] });
  });
});
