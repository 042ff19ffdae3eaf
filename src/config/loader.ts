import { existsSync, readFileSync } from 'node:fs';
import { load as loadYaml } from 'js-yaml';
import { runtimeConfigSchema, type RuntimeConfig } from './schema.js';

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${VAR}` placeholders in every string of a parsed YAML tree.
 * An unset variable is an error rather than an empty string.
 */
export function resolveEnvPlaceholders(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER, (_, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new Error(`Environment variable ${name} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = resolveEnvPlaceholders(inner, env);
    }
    return out;
  }
  return value;
}

export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const raw = loadYaml(text) ?? {};
  const config = runtimeConfigSchema.parse(resolveEnvPlaceholders(raw, env));
  return applyEnvOverrides(config, env);
}

/**
 * Load and validate a YAML config file.
 */
export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return parseConfig(readFileSync(path, 'utf-8'), env);
}

/**
 * Like loadConfig, but a missing file yields the defaults.
 */
export function loadConfigOrDefaults(path: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  if (!existsSync(path)) {
    return applyEnvOverrides(runtimeConfigSchema.parse({}), env);
  }
  return loadConfig(path, env);
}

function applyEnvOverrides(config: RuntimeConfig, env: NodeJS.ProcessEnv): RuntimeConfig {
  const port = env.PORT;
  if (port === undefined || port === '') return config;

  const parsed = Number(port);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${port}"`);
  }
  return { ...config, port: parsed };
}
