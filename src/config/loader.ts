import type { AppConfig, BackendConfig, LogLevel } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigValidationError } from './validator.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge<T>(base: T, override: DeepPartial<T>): T {
  const result = { ...base };
  for (const key of Object.keys(override) as Array<keyof T>) {
    const val = override[key];
    if (val !== undefined && val !== null) {
      const current = base[key];
      if (isPlainObject(val) && isPlainObject(current)) {
        result[key] = deepMerge<Record<string, unknown>>(current, val) as T[keyof T];
      } else {
        result[key] = val as T[keyof T];
      }
    }
  }
  return result;
}

function loadFileConfig(cwd: string): DeepPartial<AppConfig> {
  const candidates = [
    join(cwd, '.sagemaker-gateway.json'),
    join(cwd, 'sagemaker-gateway.config.json'),
  ];
  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      const raw = readFileSync(candidate, 'utf-8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigValidationError(`Cannot parse ${candidate}: ${reason}`);
      }
      if (!isPlainObject(parsed)) {
        throw new ConfigValidationError(`${candidate} must contain a JSON object.`);
      }
      return parsed as DeepPartial<AppConfig>;
    }
  }
  return {};
}

function parseNumberEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigValidationError(`${name} must be a number, got "${raw}".`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function loadEnvOverrides(): DeepPartial<AppConfig> {
  const overrides: DeepPartial<AppConfig> = {};

  const port = parseNumberEnv('GATEWAY_PORT');
  const host = process.env['GATEWAY_HOST'];
  if (port !== undefined || host) {
    overrides.api = {
      ...(port !== undefined ? { port } : {}),
      ...(host ? { host } : {}),
    };
  }

  const logLevel = process.env['GATEWAY_LOG_LEVEL'];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigValidationError(
        `GATEWAY_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}".`,
      );
    }
    overrides.logLevel = logLevel;
  }

  const maxTokens = parseNumberEnv('GATEWAY_DEFAULT_MAX_TOKENS');
  const temperature = parseNumberEnv('GATEWAY_DEFAULT_TEMPERATURE');
  if (maxTokens !== undefined || temperature !== undefined) {
    overrides.generation = {
      ...(maxTokens !== undefined ? { maxTokens } : {}),
      ...(temperature !== undefined ? { temperature } : {}),
    };
  }

  return overrides;
}

function applyBackendEnv(backend: BackendConfig): BackendConfig {
  const backendUrl = process.env['GATEWAY_BACKEND_URL'];
  const endpointName = process.env['SAGEMAKER_ENDPOINT_NAME'];
  const region = process.env['AWS_REGION'];

  // A backend URL selects the HTTP transport regardless of the configured type.
  if (backendUrl) {
    const apiKey = process.env['GATEWAY_BACKEND_API_KEY'];
    return {
      type: 'http',
      baseUrl: backendUrl,
      modelId: endpointName ?? (backend.type === 'http' ? backend.modelId : 'local-model'),
      ...(apiKey ? { apiKey } : {}),
    };
  }
  if (backend.type === 'sagemaker') {
    return {
      ...backend,
      ...(endpointName !== undefined ? { endpointName } : {}),
      ...(region ? { region } : {}),
    };
  }
  return backend;
}

export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const fileConfig = loadFileConfig(cwd);
  const envOverrides = loadEnvOverrides();

  let config = deepMerge(DEFAULT_CONFIG, fileConfig);
  config = deepMerge(config, envOverrides);

  return { ...config, backend: applyBackendEnv(config.backend) };
}
