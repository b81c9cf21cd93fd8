/**
 * Parameter Overrides Tests
 * Persisted overrides file round trip and validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  addOverride,
  clearOverrides,
  getOverridesAsParams,
  getOverridesSummary,
  loadOverrides,
  removeOverride,
} from '../../src/config/overrides.js';
import { MalformedConfigurationError } from '../../src/core/errors.js';

describe('Parameter overrides file', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'resupply-overrides-'));
    path = join(dir, 'nested', 'overrides.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should start empty when the file is missing', () => {
    expect(loadOverrides(path).overrides).toEqual([]);
    expect(getOverridesAsParams(path)).toEqual({});
    expect(getOverridesSummary(path)).toBe('No parameter overrides applied.');
  });

  it('should add, replace and flatten overrides', () => {
    expect(addOverride({ param: 'loading_rate', value: 6000, source: 'test' }, path)).toBe(true);
    expect(addOverride({ param: 'port_location', value: 'harbour', source: 'test' }, path)).toBe(true);
    expect(
      addOverride({ param: 'loading_rate', value: 7000, source: 'test', rationale: 'faster cranes' }, path)
    ).toBe(true);

    expect(getOverridesAsParams(path)).toEqual({ loading_rate: 7000, port_location: 'harbour' });
    expect(loadOverrides(path).overrides.map((o) => o.param)).toEqual(['port_location', 'loading_rate']);
  });

  it('should refuse a value of the wrong type', () => {
    expect(() => addOverride({ param: 'time_step', value: 'hourly', source: 'test' }, path)).toThrow(
      MalformedConfigurationError
    );
  });

  it('should remove and clear overrides', () => {
    addOverride({ param: 'loading_rate', value: 6000, source: 'test' }, path);
    addOverride({ param: 'time_step', value: 2, source: 'test' }, path);

    expect(removeOverride('loading_rate', path)).toBe(true);
    expect(removeOverride('loading_rate', path)).toBe(false);
    expect(getOverridesAsParams(path)).toEqual({ time_step: 2 });

    expect(clearOverrides(path)).toBe(true);
    expect(JSON.parse(readFileSync(path, 'utf-8')).overrides).toEqual([]);
  });

  it('should ignore a malformed file', () => {
    addOverride({ param: 'loading_rate', value: 6000, source: 'test' }, path);
    writeFileSync(path, JSON.stringify({ version: 1, overrides: [{ param: 'warp' }] }));

    expect(loadOverrides(path).overrides).toEqual([]);
  });
});
