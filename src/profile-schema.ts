/**
 * profile-schema.ts
 * Per-family model profile fields and their validation
 */

import { z } from 'zod';
import type { ModelFamily } from './gateway.types.js';
import type { ProfileUpdates, ProfileValue } from './model-profile-store.js';
import { ProfileFieldError } from './utils/errors.js';
import { isPlainObject } from './utils/json-utils.js';

interface FieldSpecBase {
  name: string;
  label: string;
  description: string;
  applies_at: 'generation';
}

export type ProfileFieldSpec =
  | (FieldSpecBase & { type: 'string'; max_length: number; default: string })
  | (FieldSpecBase & { type: 'number'; min: number; max: number; step: number; default: number })
  | (FieldSpecBase & { type: 'integer'; min: number; max: number; default: number })
  | (FieldSpecBase & { type: 'enum'; choices: readonly [string, ...string[]]; default: string });

export interface ProfileSchema {
  model_id: string;
  family: ModelFamily;
  fields: ProfileFieldSpec[];
  notes: string[];
}

type SamplingDefaults = Record<'temperature' | 'top_p' | 'top_k' | 'min_p' | 'repeat_penalty', number>;

const FAMILY_SAMPLING_DEFAULTS: Record<ModelFamily, SamplingDefaults> = {
  'gpt-oss': { temperature: 1.0, top_p: 1.0, top_k: 0, min_p: 0, repeat_penalty: 1.0 },
  qwen: { temperature: 0.7, top_p: 0.8, top_k: 20, min_p: 0, repeat_penalty: 1.05 },
  generic: { temperature: 0.8, top_p: 0.95, top_k: 40, min_p: 0.05, repeat_penalty: 1.0 },
};

const FAMILY_NOTES: Record<ModelFamily, string[]> = {
  'gpt-oss': [
    'reasoning_effort is sent as a "Reasoning: <level>" line at the top of the system message.',
  ],
  qwen: ['Qwen models are tuned for temperature 0.7 with top_k 20.'],
  generic: [],
};

const COMMON_NOTES = [
  'Stored values only fill fields the request leaves out; request values always win.',
  'A null value unsets the field and falls back to the backend default.',
];

export function inferModelFamily(modelId: string): ModelFamily {
  const id = modelId.toLowerCase();
  if (id.includes('gpt-oss')) {
    return 'gpt-oss';
  }
  if (id.includes('qwen')) {
    return 'qwen';
  }
  return 'generic';
}

export function profileFieldsFor(family: ModelFamily): ProfileFieldSpec[] {
  const sampling = FAMILY_SAMPLING_DEFAULTS[family];
  const fields: ProfileFieldSpec[] = [
    {
      name: 'system_prompt',
      label: 'System prompt',
      type: 'string',
      max_length: 16000,
      default: '',
      description: 'Prepended as a system message when the request has none.',
      applies_at: 'generation',
    },
    {
      name: 'temperature',
      label: 'Temperature',
      type: 'number',
      min: 0,
      max: 2,
      step: 0.05,
      default: sampling.temperature,
      description: 'Sampling temperature.',
      applies_at: 'generation',
    },
    {
      name: 'top_p',
      label: 'Top P',
      type: 'number',
      min: 0,
      max: 1,
      step: 0.01,
      default: sampling.top_p,
      description: 'Nucleus sampling cutoff.',
      applies_at: 'generation',
    },
    {
      name: 'top_k',
      label: 'Top K',
      type: 'integer',
      min: 0,
      max: 500,
      default: sampling.top_k,
      description: 'Sample from the K most likely tokens (0 disables).',
      applies_at: 'generation',
    },
    {
      name: 'min_p',
      label: 'Min P',
      type: 'number',
      min: 0,
      max: 1,
      step: 0.01,
      default: sampling.min_p,
      description: 'Minimum token probability relative to the most likely token.',
      applies_at: 'generation',
    },
    {
      name: 'repeat_penalty',
      label: 'Repeat penalty',
      type: 'number',
      min: 0.5,
      max: 2,
      step: 0.01,
      default: sampling.repeat_penalty,
      description: 'Penalty applied to repeated tokens.',
      applies_at: 'generation',
    },
    {
      name: 'max_tokens',
      label: 'Max tokens',
      type: 'integer',
      min: 1,
      max: 131072,
      default: 4096,
      description: 'Upper bound on generated tokens.',
      applies_at: 'generation',
    },
  ];
  if (family === 'gpt-oss') {
    fields.push({
      name: 'reasoning_effort',
      label: 'Reasoning effort',
      type: 'enum',
      choices: ['low', 'medium', 'high'],
      default: 'medium',
      description: 'How much the model reasons before answering.',
      applies_at: 'generation',
    });
  }
  return fields;
}

export function buildProfileSchema(modelId: string): ProfileSchema {
  const family = inferModelFamily(modelId);
  return {
    model_id: modelId,
    family,
    fields: profileFieldsFor(family),
    notes: [...COMMON_NOTES, ...FAMILY_NOTES[family]],
  };
}

function valueSchemaFor(spec: ProfileFieldSpec): z.ZodType<ProfileValue, z.ZodTypeDef, unknown> {
  switch (spec.type) {
    case 'string':
      return z.string().max(spec.max_length);
    case 'number':
      return z.number().finite().min(spec.min).max(spec.max);
    case 'integer':
      return z.number().int().min(spec.min).max(spec.max);
    case 'enum':
      return z
        .string()
        .transform(value => value.trim().toLowerCase())
        .pipe(z.enum(spec.choices));
  }
}

/**
 * Validate a `values` object against the family's fields. `null` passes
 * through as "unset".
 *
 * @throws ProfileFieldError naming the first offending field
 */
export function validateProfileValues(family: ModelFamily, raw: unknown): ProfileUpdates {
  if (!isPlainObject(raw)) {
    throw new ProfileFieldError('values', 'must be an object');
  }
  const fields = profileFieldsFor(family);
  const result: ProfileUpdates = {};
  for (const [key, value] of Object.entries(raw)) {
    const spec = fields.find(field => field.name === key);
    if (!spec) {
      throw new ProfileFieldError(key, `unknown field for model family '${family}'`);
    }
    if (value === null) {
      result[key] = null;
      continue;
    }
    const parsed = valueSchemaFor(spec).safeParse(value);
    if (!parsed.success) {
      throw new ProfileFieldError(key, parsed.error.issues[0]?.message ?? 'invalid value');
    }
    result[key] = parsed.data;
  }
  return result;
}
