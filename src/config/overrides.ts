/**
 * Parameter Overrides Manager
 * Persists parameter overrides to a JSON file that is applied
 * on top of the data source's parameters at setup
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { ParamName, ParamOverrides } from '../core/types.js';
import { PARAM_NAMES, parseOverrides } from './schema.js';

export const DEFAULT_OVERRIDES_PATH = './config/param-overrides.json';

// ============================================================================
// Types
// ============================================================================

export interface ParamOverride {
  param: ParamName;
  value: number | string;
  appliedAt: string;
  source: string; // e.g., "cli", "study-loading_rate"
  rationale?: string;
}

export interface OverridesFile {
  version: number;
  lastModified: string;
  overrides: ParamOverride[];
}

const OverridesFileSchema = z.object({
  version: z.number().int(),
  lastModified: z.string(),
  overrides: z.array(
    z.object({
      param: z.enum(PARAM_NAMES),
      value: z.union([z.number(), z.string()]),
      appliedAt: z.string(),
      source: z.string(),
      rationale: z.string().optional(),
    })
  ),
});

function emptyOverrides(): OverridesFile {
  return {
    version: 1,
    lastModified: new Date().toISOString(),
    overrides: [],
  };
}

// ============================================================================
// Load/Save Functions
// ============================================================================

/**
 * Load overrides from file. A missing or unreadable file yields no overrides.
 */
export function loadOverrides(path: string = DEFAULT_OVERRIDES_PATH): OverridesFile {
  if (!existsSync(path)) {
    return emptyOverrides();
  }

  try {
    const parsed = OverridesFileSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
    console.warn(
      '[ParamOverrides] Ignoring malformed overrides file:',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    );
  } catch (error) {
    console.warn('[ParamOverrides] Failed to load overrides:', error);
  }

  return emptyOverrides();
}

/**
 * Save overrides to file
 */
export function saveOverrides(data: OverridesFile, path: string = DEFAULT_OVERRIDES_PATH): boolean {
  try {
    data.lastModified = new Date().toISOString();
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(data, null, 2), 'utf-8');
    console.log('[ParamOverrides] Saved to', path);
    return true;
  } catch (error) {
    console.error('[ParamOverrides] Failed to save:', error);
    return false;
  }
}

/**
 * Add an override, replacing any existing one for the same parameter
 */
export function addOverride(
  override: Omit<ParamOverride, 'appliedAt'>,
  path: string = DEFAULT_OVERRIDES_PATH
): boolean {
  // Rejects values of the wrong type before they reach the file
  parseOverrides({ [override.param]: override.value });

  const data = loadOverrides(path);
  data.overrides = data.overrides.filter((o) => o.param !== override.param);
  data.overrides.push({
    ...override,
    appliedAt: new Date().toISOString(),
  });

  return saveOverrides(data, path);
}

/**
 * Remove the override for a parameter
 */
export function removeOverride(param: ParamName, path: string = DEFAULT_OVERRIDES_PATH): boolean {
  const data = loadOverrides(path);
  const initialLength = data.overrides.length;
  data.overrides = data.overrides.filter((o) => o.param !== param);

  if (data.overrides.length < initialLength) {
    return saveOverrides(data, path);
  }
  return false;
}

export function clearOverrides(path: string = DEFAULT_OVERRIDES_PATH): boolean {
  return saveOverrides(emptyOverrides(), path);
}

/**
 * Current overrides as a params object, e.g. { loading_rate: 6000 }
 */
export function getOverridesAsParams(path: string = DEFAULT_OVERRIDES_PATH): ParamOverrides {
  const data = loadOverrides(path);
  const result: Record<string, number | string> = {};

  for (const override of data.overrides) {
    result[override.param] = override.value;
  }

  const overrides = parseOverrides(result);
  if (data.overrides.length > 0) {
    console.log(`[ParamOverrides] Loaded ${data.overrides.length} override(s) from ${path}`);
  }
  return overrides;
}

/**
 * Summary for display
 */
export function getOverridesSummary(path: string = DEFAULT_OVERRIDES_PATH): string {
  const data = loadOverrides(path);

  if (data.overrides.length === 0) {
    return 'No parameter overrides applied.';
  }

  const lines = [`Parameter Overrides (${data.overrides.length}):`];
  for (const o of data.overrides) {
    lines.push(`  ${o.param}: ${JSON.stringify(o.value)}`);
    lines.push(`    Source: ${o.source} | Applied: ${o.appliedAt}`);
    if (o.rationale) {
      lines.push(`    Rationale: ${o.rationale}`);
    }
  }

  return lines.join('\n');
}
