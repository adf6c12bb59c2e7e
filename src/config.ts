import path from 'path';
import { existsSync } from 'fs';
import { pathToFileURL } from 'url';
import defaultConfig from './default.config.js';
import { UsageError } from './errors.js';
import { parseFormat } from './reporter.js';
import type { ReportFormat } from './reporter.js';

export const PROJECT_CONFIG_FILE = 'jsoncheck.config.js';

export interface CliConfig {
  configFile?: string;
  baseUrl?: string;
  suiteFile?: string;
  format?: string;
  outputFile?: string;
  timeout?: number;
  verbose?: boolean;
  boolAsInt?: boolean;
  headers?: Record<string, string>;
}

/** Configuration after every layer has been applied. */
export interface ResolvedConfig {
  baseUrl: string;
  suiteFile: string;
  format: ReportFormat;
  outputFile?: string;
  timeout: number;
  verbose: boolean;
  boolAsInt: boolean;
  headers: Record<string, string>;
  projectRoot: string;
}

function parseHeader(value: string): [string, string] {
  const idx = value.indexOf(':');
  if (idx <= 0) {
    throw new UsageError(`Invalid header '${value}'. Use "Name: value".`);
  }
  return [value.slice(0, idx).trim(), value.slice(idx + 1).trim()];
}

function validTimeout(ms: number): boolean {
  return Number.isFinite(ms) && ms > 0;
}

function requireValue(key: string, value: string | undefined): string {
  if (value === undefined) {
    throw new UsageError(`Missing value for --${key}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliConfig {
  const args = argv.slice(2);
  const raw: CliConfig = {};
  const positionals: string[] = [];
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('-') && arg.length > 1) {
      let [key, value] = arg.replace(/^--?/, '').split(/=(.*)/s);
      const takesValue = !['verbose', 'bool-as-int'].includes(key);
      if (takesValue && typeof value === 'undefined') {
        const next = args[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          value = next;
          i += 1;
        }
      }
      switch (key) {
        case 'config':
          raw.configFile = requireValue(key, value);
          break;
        case 'f':
        case 'format':
          raw.format = requireValue(key, value);
          break;
        case 'o':
        case 'output':
          raw.outputFile = requireValue(key, value);
          break;
        case 'timeout': {
          const ms = parseInt(requireValue(key, value), 10);
          if (!validTimeout(ms)) {
            throw new UsageError(`Invalid timeout '${value}'`);
          }
          raw.timeout = ms;
          break;
        }
        case 'H':
        case 'header': {
          const [name, headerValue] = parseHeader(requireValue(key, value));
          raw.headers = { ...raw.headers, [name]: headerValue };
          break;
        }
        case 'verbose':
          raw.verbose = true;
          break;
        case 'bool-as-int':
          raw.boolAsInt = true;
          break;
        default:
          throw new UsageError(`unknown key ${key}`);
      }
    } else {
      positionals.push(arg);
    }
    i += 1;
  }

  // The command name is optional: `jsoncheck run <base_url> <file>`.
  if (positionals[0] === 'run') positionals.shift();
  const [baseUrl, suiteFile] = positionals;
  if (baseUrl !== undefined) raw.baseUrl = baseUrl;
  if (suiteFile !== undefined) raw.suiteFile = suiteFile;

  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keeps the fields of a config module that have the expected types. */
export function pickConfig(mod: unknown): CliConfig {
  const source = isRecord(mod) && isRecord(mod.default) ? mod.default : mod;
  if (!isRecord(source)) return {};
  const cfg: CliConfig = {};
  if (typeof source.baseUrl === 'string') cfg.baseUrl = source.baseUrl;
  if (typeof source.suiteFile === 'string') cfg.suiteFile = source.suiteFile;
  if (typeof source.format === 'string') cfg.format = source.format;
  if (typeof source.outputFile === 'string') cfg.outputFile = source.outputFile;
  if (typeof source.timeout === 'number') cfg.timeout = source.timeout;
  if (typeof source.verbose === 'boolean') cfg.verbose = source.verbose;
  if (typeof source.boolAsInt === 'boolean') cfg.boolAsInt = source.boolAsInt;
  if (isRecord(source.headers)) {
    const headers: Record<string, string> = {};
    Object.entries(source.headers).forEach(([key, value]) => {
      if (typeof value === 'string') headers[key] = value;
    });
    cfg.headers = headers;
  }
  return cfg;
}

async function importConfig(file: string): Promise<CliConfig> {
  const mod: unknown = await import(pathToFileURL(file).href);
  return pickConfig(mod);
}

export function resolveConfig(layers: CliConfig[], projectRoot: string): ResolvedConfig {
  let cfg: CliConfig = { ...defaultConfig };
  for (const layer of layers) {
    cfg = { ...cfg, ...layer, headers: { ...cfg.headers, ...layer.headers } };
  }

  if (!cfg.baseUrl || !cfg.suiteFile) {
    throw new UsageError('usage: jsoncheck run <base_url> <test_file_name> [--format json|text]');
  }
  let format: ReportFormat;
  try {
    format = parseFormat(cfg.format ?? defaultConfig.format);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
  // config modules are not checked when they are read
  const timeout = cfg.timeout ?? defaultConfig.timeout;
  if (!validTimeout(timeout)) {
    throw new UsageError(`Invalid timeout '${timeout}'`);
  }

  return {
    baseUrl: cfg.baseUrl,
    suiteFile: path.resolve(projectRoot, cfg.suiteFile),
    format,
    outputFile: cfg.outputFile ? path.resolve(projectRoot, cfg.outputFile) : undefined,
    timeout,
    verbose: cfg.verbose ?? defaultConfig.verbose,
    boolAsInt: cfg.boolAsInt ?? defaultConfig.boolAsInt,
    headers: cfg.headers ?? {},
    projectRoot,
  };
}

export async function loadConfig(argv = process.argv): Promise<ResolvedConfig> {
  const cliOpts = parseArgs(argv);
  const projectRoot = process.cwd();
  const layers: CliConfig[] = [];

  // first the project config.
  const projectCfgPath = path.join(projectRoot, PROJECT_CONFIG_FILE);
  if (existsSync(projectCfgPath)) {
    try {
      layers.push(await importConfig(projectCfgPath));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`Ignoring ${PROJECT_CONFIG_FILE}: ${reason}`);
    }
  }

  // then invocation-time config.
  if (cliOpts.configFile) {
    layers.push(await importConfig(path.resolve(projectRoot, cliOpts.configFile)));
  }

  // then cli options over the configs.
  layers.push(cliOpts);
  return resolveConfig(layers, projectRoot);
}
