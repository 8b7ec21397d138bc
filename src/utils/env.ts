import { ConfigurationError } from '../errors.js';

export function optionalEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

export function parseIntStrict(value: string, label: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${label} must be an integer, received '${value}'`);
  }
  return Number.parseInt(value, 10);
}

export function parseFloatStrict(value: string, label: string): number {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${label} must be numeric, received '${value}'`);
  }
  return parsed;
}

export function parseOptionalInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = optionalEnv(env, name);
  return value === undefined ? undefined : parseIntStrict(value, name);
}

export function parseOptionalFloat(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = optionalEnv(env, name);
  return value === undefined ? undefined : parseFloatStrict(value, name);
}
