import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read every full-name variable', () => {
      const env = {
        EXPAIR_NUMERIC_PRECISION: '40',
        EXPAIR_CLOSURE_SEARCH_DEPTH: '7',
        EXPAIR_CLOSURE_PRUNE: 'false',
        EXPAIR_PROOF_METHOD: 'complexity',
        EXPAIR_DEBUG: 'yes',
      };
      const result = readEnvOverrides(env);

      expect(result.overrides).toEqual({
        numeric: { precision: 40 },
        closure: { search_depth: 7, prune: false },
        proof: { method: 'complexity' },
        logging: { debug: true },
      });
      expect(result.appliedVars).toEqual([
        'EXPAIR_NUMERIC_PRECISION',
        'EXPAIR_CLOSURE_SEARCH_DEPTH',
        'EXPAIR_CLOSURE_PRUNE',
        'EXPAIR_PROOF_METHOD',
        'EXPAIR_DEBUG',
      ]);
      expect(result.errors).toEqual([]);
    });

    it('should map EXPAIR_DEPTH to the closure search depth', () => {
      const result = readEnvOverrides({ EXPAIR_DEPTH: '2' });
      expect(result.overrides).toEqual({ closure: { search_depth: 2 } });
    });

    it('should let the full name win over the shortcut', () => {
      const result = readEnvOverrides({ EXPAIR_DEPTH: '2', EXPAIR_CLOSURE_SEARCH_DEPTH: '4' });
      expect(result.overrides.closure?.search_depth).toBe(4);
    });

    it('should ignore empty and unrelated variables', () => {
      const result = readEnvOverrides({ EXPAIR_DEPTH: '', HOME: '/home/test' });
      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should accept the proof method case-insensitively', () => {
      const result = readEnvOverrides({ EXPAIR_PROOF_METHOD: ' Date ' });
      expect(result.overrides.proof?.method).toBe('date');
    });

    it('should throw EnvCoercionError for a non-numeric depth', () => {
      expect(() => readEnvOverrides({ EXPAIR_DEPTH: 'deep' })).toThrow(EnvCoercionError);
    });

    it('should throw for a whitespace-only number', () => {
      expect(() => readEnvOverrides({ EXPAIR_NUMERIC_PRECISION: '  ' })).toThrow(
        "Empty value for 'EXPAIR_NUMERIC_PRECISION'"
      );
    });

    it('should throw for an unknown proof method', () => {
      expect(() => readEnvOverrides({ EXPAIR_PROOF_METHOD: 'fastest' })).toThrow(
        "Cannot coerce 'EXPAIR_PROOF_METHOD' value 'fastest' to proof method. Expected one of: date, complexity, none"
      );
    });

    it('should collect errors when asked and keep the valid overrides', () => {
      const result = readEnvOverrides(
        { EXPAIR_CLOSURE_PRUNE: 'maybe', EXPAIR_DEBUG: 'on' },
        { collectErrors: true }
      );

      expect(result.overrides).toEqual({ logging: { debug: true } });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('EXPAIR_CLOSURE_PRUNE');
      expect(result.errors[0]?.rawValue).toBe('maybe');
      expect(result.errors[0]?.expectedType).toBe('boolean');
    });

    it('should coerce every integer depth', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 1000 }), (depth) => {
          const result = readEnvOverrides({ EXPAIR_DEPTH: String(depth) });
          expect(result.overrides.closure?.search_depth).toBe(depth);
        })
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should give env precedence over the config file', () => {
      const fromFile = parseConfig('[closure]\nsearch_depth = 3\nprune = false\n');
      const config = applyEnvOverrides(fromFile, { EXPAIR_DEPTH: '6' });

      expect(config.closure).toEqual({ search_depth: 6, prune: false });
      expect(config.proof).toEqual(DEFAULT_CONFIG.proof);
    });

    it('should return the config unchanged for an empty environment', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('mergeConfig', () => {
    it('should not modify the base', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { logging: { debug: true } });

      expect(merged.logging.debug).toBe(true);
      expect(DEFAULT_CONFIG.logging.debug).toBe(false);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      expect(Object.keys(getEnvVarDocumentation()).sort()).toEqual([
        'EXPAIR_CLOSURE_PRUNE',
        'EXPAIR_CLOSURE_SEARCH_DEPTH',
        'EXPAIR_DEBUG',
        'EXPAIR_DEPTH',
        'EXPAIR_NUMERIC_PRECISION',
        'EXPAIR_PROOF_METHOD',
      ]);
      expect(getEnvVarDocumentation().EXPAIR_CLOSURE_PRUNE?.type).toBe('boolean');
    });
  });
});
