import * as yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import { GovernanceConfigSchema, validateReferences, type ValidatedGovernanceConfig } from '../shared/schemas.js';
import type { GovernanceConfig } from '../shared/types.js';
import type { EngineDefaults } from './governance-engine.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public details: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Parse and validate a governance YAML config string.
 */
export function parseConfig(yamlContent: string): ValidatedGovernanceConfig {
  let raw: unknown;
  try {
    raw = yaml.load(yamlContent);
  } catch (err) {
    throw new ConfigLoadError(`Invalid YAML: ${(err as Error).message}`);
  }

  // Resolve env vars first so "${OPS_TOKEN}" is validated as the real value
  const result = GovernanceConfigSchema.safeParse(resolveEnvVars(raw));
  if (!result.success) {
    const details = result.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    );
    throw new ConfigLoadError('Config validation failed', details);
  }

  const refErrors = validateReferences(result.data);
  if (refErrors.length > 0) {
    throw new ConfigLoadError('Invalid references in config', refErrors);
  }

  const seedErrors = validateLedgerSeed(result.data);
  if (seedErrors.length > 0) {
    throw new ConfigLoadError('Invalid ledger seed', seedErrors);
  }

  return result.data;
}

/**
 * Engine defaults from the config's `defaults` block.
 */
export function engineDefaults(config: GovernanceConfig): EngineDefaults {
  const { defaults } = config.governance;
  return {
    shareClass: defaults.share_class,
    model: defaults.model,
    weighting: defaults.weighting,
  };
}

// Supplies must stay exact integers, and proposals on the default class need voters
function validateLedgerSeed(config: GovernanceConfig): string[] {
  const errors: string[] = [];
  for (const shareClass of config.governance.ledger.share_classes) {
    const amounts = Object.values(shareClass.holders);
    const supply = amounts.reduce((sum, amount) => sum + amount, 0);
    if (!Number.isSafeInteger(supply)) {
      errors.push(`Share class "${shareClass.id}" supply ${supply} is not a safe integer`);
    }
    if (shareClass.id === config.governance.defaults.share_class && !amounts.some((amount) => amount > 0)) {
      errors.push(`Default share class "${shareClass.id}" has no holders`);
    }
  }
  return errors;
}

/**
 * Load and validate a governance config from a file path.
 */
export function loadConfigFile(filePath: string): ValidatedGovernanceConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Cannot read config file: ${(err as Error).message}`);
  }
  return parseConfig(content);
}

/**
 * Recursively resolve ${ENV_VAR} patterns in string values.
 */
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      return process.env[varName] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = resolveEnvVars(val);
    }
    return result;
  }
  return value;
}
