/**
 * Unified runtime configuration loader.
 *
 * Goals:
 *  - One parsed, typed surface for environment driven behavior (PCL_* variables).
 *  - Keep process.env reads out of the loading pipeline: providers receive an
 *    explicit options value (see loaderOptionsFromConfig in services/contentLoader).
 */
import path from 'path';
import { getBooleanEnv, getCsvEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  sync: boolean;
  file?: string;
}

interface TracingConfig {
  level: 0 | 1 | 2 | 3 | 4;
  categories: Set<string>;
  file?: string;
}

interface LoaderConfig {
  validate: boolean;
  check: boolean;
  strict: boolean;
  deprecated: boolean;
}

interface ProvidersConfig {
  securePaths: string[];
}

export interface RuntimeConfig {
  logging: LoggingConfig;
  tracing: TracingConfig;
  loader: LoaderConfig;
  providers: ProvidersConfig;
}

export const DEFAULT_SECURE_PROVIDER_PATHS = ['/usr/local/share/pcl-providers-1', '/usr/share/pcl-providers-1'];

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const deprecationNotices = new Set<string>();
function warnOnce(msg: string){
  if(!deprecationNotices.has(msg)){
    deprecationNotices.add(msg);
    // eslint-disable-next-line no-console
    console.warn(`[config:deprecation] ${msg}`);
  }
}

function toAbsolute(raw: string | undefined): string | undefined {
  if(!raw || !raw.trim().length) return undefined;
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

function numberFromEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if(!raw) return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

function clampTraceLevel(value: number): TracingConfig['level'] {
  if(value <= 0) return 0;
  if(value >= 4) return 4;
  switch(Math.floor(value)){
    case 1: return 1;
    case 2: return 2;
    default: return 3;
  }
}

function parseLogLevel(): LogLevel {
  const raw = (process.env.PCL_LOG_LEVEL || '').trim().toLowerCase();
  if(!raw) return getBooleanEnv('PCL_VERBOSE') ? 'debug' : 'info';
  if(getBooleanEnv('PCL_VERBOSE')) warnOnce('PCL_VERBOSE is ignored when PCL_LOG_LEVEL is set');
  const match = LOG_LEVELS.find(l => l === raw);
  return match ?? 'info';
}

function parseLoggingConfig(): LoggingConfig {
  return {
    level: parseLogLevel(),
    json: getBooleanEnv('PCL_LOG_JSON'),
    sync: getBooleanEnv('PCL_LOG_SYNC'),
    file: toAbsolute(process.env.PCL_LOG_FILE)
  };
}

function parseTracingConfig(): TracingConfig {
  return {
    level: clampTraceLevel(numberFromEnv('PCL_TRACE_LEVEL', 0)),
    categories: new Set(getCsvEnv('PCL_TRACE_CATEGORIES')),
    file: toAbsolute(process.env.PCL_TRACE_FILE)
  };
}

function parseLoaderConfig(): LoaderConfig {
  return {
    validate: getBooleanEnv('PCL_VALIDATE', true),
    check: getBooleanEnv('PCL_CHECK'),
    strict: getBooleanEnv('PCL_VALIDATE_STRICT'),
    deprecated: getBooleanEnv('PCL_VALIDATE_DEPRECATED')
  };
}

function parseProvidersConfig(): ProvidersConfig {
  const listed = getCsvEnv('PCL_SECURE_PROVIDER_PATHS');
  return { securePaths: listed.length ? listed.map(p => path.resolve(p)) : [...DEFAULT_SECURE_PROVIDER_PATHS] };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return {
    logging: parseLoggingConfig(),
    tracing: parseTracingConfig(),
    loader: parseLoaderConfig(),
    providers: parseProvidersConfig()
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}
