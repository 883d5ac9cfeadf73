/**
 * model-registry.ts
 * Parsing of a backend's model list and merging of split-model parts
 */

import { z } from 'zod';
import type { LogicalModel, ModelLoadState, ModelStatusValue } from './gateway.types.js';

const statusValueSchema = z
  .enum(['unloaded', 'loading', 'loaded', 'unloading', 'unknown'])
  .catch('unknown');

const registryEntrySchema = z.object({
  id: z.string().min(1),
  status: z
    .object({
      value: statusValueSchema.default('unknown'),
      failed: z.boolean().catch(false).default(false),
      args: z.array(z.string()).catch([]).default([]),
    })
    .catch({ value: 'unknown', failed: false, args: [] })
    .default({}),
});

const SPLIT_PART_PATTERN = /^(.*)-(\d+)-of-(\d+)$/;

/**
 * Higher wins when merging the parts of one split model
 */
const STATUS_PRECEDENCE: Record<ModelStatusValue, number> = {
  loaded: 4,
  loading: 3,
  unloading: 2,
  unloaded: 1,
  unknown: 0,
};

/**
 * Extract the registry entries from a `{ data: [...] }` body. Entries that do
 * not carry an id are skipped.
 */
export function parseModelList(body: unknown): ModelLoadState[] {
  if (typeof body !== 'object' || body === null || !('data' in body) || !Array.isArray(body.data)) {
    return [];
  }
  const entries: ModelLoadState[] = [];
  for (const raw of body.data) {
    const parsed = registryEntrySchema.safeParse(raw);
    if (parsed.success) {
      entries.push(parsed.data);
    }
  }
  return entries;
}

export interface SplitPart {
  base: string;
  index: number;
  total: number;
}

export function parseSplitPart(id: string): SplitPart | undefined {
  const match = SPLIT_PART_PATTERN.exec(id);
  if (!match) {
    return undefined;
  }
  return { base: match[1], index: Number(match[2]), total: Number(match[3]) };
}

/**
 * Merge `name-K-of-N` parts into one logical entry per (name, N). Order
 * follows the first appearance of each group.
 */
export function collapseSplitModels(entries: ModelLoadState[]): LogicalModel[] {
  const result: LogicalModel[] = [];
  const groups = new Map<string, Array<{ entry: ModelLoadState; index: number }>>();
  const slots = new Map<string, number>();

  for (const entry of entries) {
    const part = parseSplitPart(entry.id);
    if (!part) {
      result.push({ id: entry.id, status: { ...entry.status, args: [...entry.status.args] } });
      continue;
    }
    const key = `${part.base}\u0000${part.total}`;
    let group = groups.get(key);
    if (!group) {
      group = [];
      groups.set(key, group);
      slots.set(key, result.length);
      // placeholder, filled below
      result.push({ id: entry.id, status: { value: 'unknown', failed: false, args: [] } });
    }
    group.push({ entry, index: part.index });
  }

  for (const [key, group] of groups) {
    const slot = slots.get(key);
    if (slot === undefined) {
      continue;
    }
    group.sort((a, b) => a.index - b.index);
    const first = group[0].entry;
    let value: ModelStatusValue = 'unknown';
    for (const { entry } of group) {
      if (STATUS_PRECEDENCE[entry.status.value] > STATUS_PRECEDENCE[value]) {
        value = entry.status.value;
      }
    }
    result[slot] = {
      id: first.id,
      status: {
        value,
        failed: group.some(({ entry }) => entry.status.failed),
        args: [...first.status.args],
      },
      parts: group.map(({ entry }) => entry.id),
    };
  }

  return result;
}

/**
 * Find the logical model a caller-supplied id refers to (its own id or any part id)
 */
export function findLogicalModel(models: LogicalModel[], modelId: string): LogicalModel | undefined {
  return models.find(model => model.id === modelId || (model.parts?.includes(modelId) ?? false));
}

/**
 * `--flag value` pairs from a runtime argument list; bare flags map to "true"
 */
export function parseRuntimeArgs(args: string[]): Record<string, string> {
  const runtime: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const token = args[i];
    if (!token.startsWith('-') || /^-\d/.test(token)) {
      continue;
    }
    const next = args[i + 1];
    if (next !== undefined && (!next.startsWith('-') || /^-\d/.test(next))) {
      runtime[token] = next;
      i++;
    } else {
      runtime[token] = 'true';
    }
  }
  return runtime;
}
