/**
 * model-profile-store.test.ts
 * Tests for file-backed profile persistence
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ModelProfileStore } from '../../src/model-profile-store.js';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

const FIXED_NOW = new Date('2026-01-02T03:04:05.000Z');

describe('ModelProfileStore', () => {
  let dir: string;
  let filePath: string;
  let store: ModelProfileStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'profile-store-'));
    filePath = path.join(dir, 'nested', 'model-profiles.json');
    store = new ModelProfileStore(filePath, () => FIXED_NOW);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return an empty profile when nothing is stored', async () => {
    expect(await store.getProfile('gpt-oss-20b')).toEqual({});
    expect(await store.getEntry('gpt-oss-20b')).toBeUndefined();
  });

  it('should persist a document keyed by model id', async () => {
    await store.setProfile('gpt-oss-20b', { temperature: 0.7, reasoning_effort: 'high' }, false);

    const onDisk: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(onDisk).toEqual({
      version: 1,
      models: {
        'gpt-oss-20b': {
          updated_at: '2026-01-02T03:04:05.000Z',
          values: { reasoning_effort: 'high', temperature: 0.7 },
        },
      },
    });
  });

  it('should reload what a previous instance wrote', async () => {
    await store.setProfile('qwen3-coder-30b', { top_k: 20 }, false);
    const reopened = new ModelProfileStore(filePath);
    expect(await reopened.getProfile('qwen3-coder-30b')).toEqual({ top_k: 20 });
    expect(await reopened.listProfiles()).toEqual({ 'qwen3-coder-30b': { top_k: 20 } });
  });

  it('should merge-patch and delete keys set to null', async () => {
    await store.setProfile('m', { temperature: 0.5, top_p: 0.9 }, false);
    const values = await store.patchProfile('m', { temperature: null, max_tokens: 512 });
    expect(values).toEqual({ top_p: 0.9, max_tokens: 512 });
    expect(await store.getProfile('m')).toEqual({ top_p: 0.9, max_tokens: 512 });
  });

  it('should replace the whole profile and drop nulls', async () => {
    await store.setProfile('m', { temperature: 0.5, top_p: 0.9 }, false);
    const values = await store.setProfile('m', { top_k: 40, min_p: null }, true);
    expect(values).toEqual({ top_k: 40 });
  });

  it('should remove the entry when the result is empty', async () => {
    await store.setProfile('m', { temperature: 0.5 }, false);
    await store.patchProfile('m', { temperature: null });
    expect(await store.getEntry('m')).toBeUndefined();

    const onDisk: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(onDisk).toEqual({ version: 1, models: {} });
  });

  it('should not hand out references to stored values', async () => {
    await store.setProfile('m', { temperature: 0.5 }, false);
    const values = await store.getProfile('m');
    values.temperature = 2;
    expect(await store.getProfile('m')).toEqual({ temperature: 0.5 });
  });

  it('should serialize concurrent patches', async () => {
    await Promise.all([
      store.patchProfile('m', { temperature: 0.1 }),
      store.patchProfile('m', { top_p: 0.2 }),
      store.patchProfile('m', { top_k: 3 }),
    ]);
    expect(await store.getProfile('m')).toEqual({ temperature: 0.1, top_p: 0.2, top_k: 3 });
  });

  it('should leave the previous document intact when the rename fails', async () => {
    await store.setProfile('m', { temperature: 0.5 }, false);
    vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('disk gone'));

    await expect(store.setProfile('m', { temperature: 1.5 }, false)).rejects.toThrow('disk gone');

    expect(await store.getProfile('m')).toEqual({ temperature: 0.5 });
    const reopened = new ModelProfileStore(filePath);
    expect(await reopened.getProfile('m')).toEqual({ temperature: 0.5 });
  });

  it('should start empty from an unreadable file', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{not json', 'utf-8');
    expect(await store.listProfiles()).toEqual({});
  });
});
