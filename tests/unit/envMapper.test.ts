/**
 * envMapper.test.ts
 * Tests for GATEWAY_* environment variable mapping
 */

import { describe, it, expect } from 'vitest';
import { applyEnvOverrides, parseEnvValue, setNestedValue } from '../../src/config/envMapper.js';

describe('envMapper', () => {
  describe('parseEnvValue', () => {
    it('should parse numbers and pass other strings through', () => {
      expect(parseEnvValue(' 8080 ', 'number')).toBe(8080);
      expect(parseEnvValue('1.5', 'number')).toBe(1.5);
      expect(parseEnvValue('fast', 'number')).toBe('fast');
    });

    it('should parse booleans', () => {
      expect(parseEnvValue('TRUE', 'boolean')).toBe(true);
      expect(parseEnvValue('0', 'boolean')).toBe(false);
      expect(parseEnvValue('maybe', 'boolean')).toBe('maybe');
    });

    it('should split lists into numbers or strings', () => {
      expect(parseEnvValue('500, 1000,2000', 'list')).toEqual([500, 1000, 2000]);
      expect(parseEnvValue('https://a.example, https://b.example', 'list')).toEqual([
        'https://a.example',
        'https://b.example',
      ]);
    });
  });

  describe('setNestedValue', () => {
    it('should create intermediate objects', () => {
      const target: Record<string, unknown> = { models: { coderModel: 'x' } };
      setNestedValue(target, 'models.generalModel', 'y');
      setNestedValue(target, 'terminalFeed.mode', 'off');
      expect(target).toEqual({
        models: { coderModel: 'x', generalModel: 'y' },
        terminalFeed: { mode: 'off' },
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should apply only mapped variables that are set', () => {
      const target: Record<string, unknown> = { port: 1 };
      const applied = applyEnvOverrides(target, {
        GATEWAY_PORT: '9000',
        GATEWAY_RETRY_DELAYS_MS: '100,200',
        GATEWAY_MODEL_SERIALIZE_LOADS: 'false',
        UNRELATED: 'x',
      });
      expect(applied).toEqual(['GATEWAY_PORT', 'GATEWAY_RETRY_DELAYS_MS', 'GATEWAY_MODEL_SERIALIZE_LOADS']);
      expect(target).toEqual({
        port: 9000,
        retry: { delaysMs: [100, 200] },
        models: { serializeLoads: false },
      });
    });
  });
});
