/**
 * model-profile-store.ts
 * File-backed per-model profile storage. The whole document is rewritten on
 * every change through a temp file and rename, one writer at a time.
 */

import fs from 'fs/promises';
import path from 'path';
import { Mutex } from './utils/async-helpers.js';
import { getErrorCode } from './utils/error-helpers.js';
import { isPlainObject, stableStringify } from './utils/json-utils.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('profile-store');

export type ProfileValue = string | number | boolean;
export type ProfileValues = Record<string, ProfileValue>;

/** `null` unsets a key */
export type ProfileUpdates = Record<string, ProfileValue | null>;

export interface ProfileEntry {
  updated_at: string;
  values: ProfileValues;
}

interface ProfileDocument {
  version: 1;
  models: Record<string, ProfileEntry>;
}

function isProfileValue(value: unknown): value is ProfileValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function readEntry(raw: unknown): ProfileEntry | undefined {
  if (!isPlainObject(raw) || !isPlainObject(raw.values)) {
    return undefined;
  }
  const values: ProfileValues = {};
  for (const [key, value] of Object.entries(raw.values)) {
    if (isProfileValue(value)) {
      values[key] = value;
    }
  }
  const updatedAt = typeof raw.updated_at === 'string' ? raw.updated_at : '';
  return { updated_at: updatedAt, values };
}

export class ModelProfileStore {
  private readonly mutex = new Mutex();
  private document: ProfileDocument | undefined;

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get path(): string {
    return this.filePath;
  }

  async getProfile(modelId: string): Promise<ProfileValues> {
    const entry = await this.getEntry(modelId);
    return entry ? { ...entry.values } : {};
  }

  async getEntry(modelId: string): Promise<ProfileEntry | undefined> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.load();
      const entry = doc.models[modelId];
      return entry ? { updated_at: entry.updated_at, values: { ...entry.values } } : undefined;
    });
  }

  async listProfiles(): Promise<Record<string, ProfileValues>> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.load();
      const result: Record<string, ProfileValues> = {};
      for (const [modelId, entry] of Object.entries(doc.models)) {
        result[modelId] = { ...entry.values };
      }
      return result;
    });
  }

  /**
   * Replace (`replace: true`, nulls dropped) or merge-patch the stored values.
   * Returns the values now stored; an empty result removes the entry.
   */
  async setProfile(modelId: string, values: ProfileUpdates, replace: boolean): Promise<ProfileValues> {
    if (!replace) {
      return this.patchProfile(modelId, values);
    }
    const clean: ProfileValues = {};
    for (const [key, value] of Object.entries(values)) {
      if (value !== null) {
        clean[key] = value;
      }
    }
    return this.commit(modelId, () => clean);
  }

  async patchProfile(modelId: string, updates: ProfileUpdates): Promise<ProfileValues> {
    return this.commit(modelId, current => {
      const merged: ProfileValues = { ...current };
      for (const [key, value] of Object.entries(updates)) {
        if (value === null) {
          delete merged[key];
        } else {
          merged[key] = value;
        }
      }
      return merged;
    });
  }

  private commit(modelId: string, next: (current: ProfileValues) => ProfileValues): Promise<ProfileValues> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.load();
      const values = next(doc.models[modelId]?.values ?? {});
      const models = { ...doc.models };
      if (Object.keys(values).length > 0) {
        models[modelId] = { updated_at: this.now().toISOString(), values };
      } else {
        delete models[modelId];
      }
      const updated: ProfileDocument = { version: 1, models };
      await this.persist(updated);
      this.document = updated;
      return { ...values };
    });
  }

  private async load(): Promise<ProfileDocument> {
    if (this.document) {
      return this.document;
    }
    const doc: ProfileDocument = { version: 1, models: {} };
    try {
      const raw: unknown = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
      if (isPlainObject(raw) && isPlainObject(raw.models)) {
        for (const [modelId, rawEntry] of Object.entries(raw.models)) {
          const entry = readEntry(rawEntry);
          if (entry) {
            doc.models[modelId] = entry;
          }
        }
      }
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') {
        log.warn(`Ignoring unreadable profile store at ${this.filePath}`, { error });
      }
    }
    this.document = doc;
    return doc;
  }

  private async persist(doc: ProfileDocument): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, stableStringify(doc), 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }
}
