/**
 * CLI Argument Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CliArgumentError,
  collectOverrides,
  parseArgs,
  parseValue,
} from '../../src/runner/cli-args.js';
import { MalformedConfigurationError } from '../../src/core/errors.js';
import { readEnvConfig } from '../../src/config/env.js';
import { addOverride } from '../../src/config/overrides.js';
import { ResupplySimulation } from '../../src/core/simulation.js';
import { InMemoryDataSource } from '../../src/storage/memory-data-source.js';
import { snapshot } from '../helpers/fixtures.js';

const defaults = { source: 'json', dataDir: './data', dbPath: 'resupply.db' };

describe('parseValue', () => {
  it('should keep numbers numeric and other text as is', () => {
    expect(parseValue('5000')).toBe(5000);
    expect(parseValue(' 0.8 ')).toBe(0.8);
    expect(parseValue('harbour')).toBe('harbour');
  });
});

describe('parseArgs', () => {
  it('should fall back to the given defaults', () => {
    expect(parseArgs([], defaults)).toEqual({
      ...defaults,
      overridesFile: null,
      overrides: {},
      study: null,
      verbose: false,
      help: false,
    });
  });

  it('should collect repeated --set overrides', () => {
    const options = parseArgs(
      ['--source', 'sqlite', '--db', 'runs.db', '--set', 'loading_rate=6000', '--set', 'port_location=harbour', '-v'],
      defaults
    );

    expect(options.source).toBe('sqlite');
    expect(options.dbPath).toBe('runs.db');
    expect(options.overrides).toEqual({ loading_rate: 6000, port_location: 'harbour' });
    expect(options.verbose).toBe(true);
  });

  it('should parse a study request', () => {
    const options = parseArgs(['--study', 'ship_speed_multiplier=0.8,1,1.2'], defaults);

    expect(options.study).toEqual({ paramName: 'ship_speed_multiplier', values: [0.8, 1, 1.2] });
  });

  it('should reject unknown options and parameters', () => {
    expect(() => parseArgs(['--ticks', '10'], defaults)).toThrow(CliArgumentError);
    expect(() => parseArgs(['--study', 'warp=1,2'], defaults)).toThrow('Unknown parameter for --study: warp');
    expect(() => parseArgs(['--set', 'warp=1'], defaults)).toThrow(MalformedConfigurationError);
  });

  it('should require name=value for --set', () => {
    expect(() => parseArgs(['--set', 'loading_rate'], defaults)).toThrow(
      '--set expects name=value, got "loading_rate"'
    );
    expect(() => parseArgs(['--set'], defaults)).toThrow('--set requires a name=value argument');
  });

  it('should flag help', () => {
    expect(parseArgs(['--help'], defaults).help).toBe(true);
  });
});

describe('collectOverrides', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'resupply-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should apply the overrides file named by RESUPPLY_OVERRIDES_PATH', () => {
    const path = join(dir, 'env-overrides.json');
    addOverride({ param: 'simulation_duration', value: 5, source: 'test' }, path);
    const env = readEnvConfig({ RESUPPLY_OVERRIDES_PATH: path });

    const overrides = collectOverrides(parseArgs([], defaults), env.overridesPath);
    expect(overrides).toEqual({ simulation_duration: 5 });

    const source = new InMemoryDataSource(snapshot({ params: { simulation_duration: 48 } }));
    const results = new ResupplySimulation(source, overrides, { persistResults: false }).run();
    expect(results.metadata.simulatedUntil).toBe(5);
  });

  it('should prefer --overrides-file over the configured path', () => {
    const configured = join(dir, 'configured.json');
    const flagged = join(dir, 'flagged.json');
    addOverride({ param: 'loading_rate', value: 3000, source: 'test' }, configured);
    addOverride({ param: 'loading_rate', value: 7000, source: 'test' }, flagged);

    const options = parseArgs(['--overrides-file', flagged], defaults);
    expect(collectOverrides(options, configured)).toEqual({ loading_rate: 7000 });
  });

  it('should let --set win over the file', () => {
    const path = join(dir, 'overrides.json');
    addOverride({ param: 'loading_rate', value: 3000, source: 'test' }, path);

    const options = parseArgs(['--set', 'loading_rate=9000'], defaults);
    expect(collectOverrides(options, path)).toEqual({ loading_rate: 9000 });
  });

  it('should contribute nothing when the configured file is missing', () => {
    expect(collectOverrides(parseArgs([], defaults), join(dir, 'absent.json'))).toEqual({});
  });
});
