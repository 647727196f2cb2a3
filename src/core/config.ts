import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ScalingConfigSchema, type ScalingConfig, type ScalingConfigInput } from './types.js';
import { ConfigError } from './errors.js';
import { createLogger, setLogger } from './logger.js';
import { formatIssues } from './validation.js';
import type { ArchitectureOptions } from '../architectures/factory.js';

export const PROJECT_CONFIG_FILE = '.agent-scaling.yaml';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: ScalingConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.agent-scaling');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ScalingConfigInput): ScalingConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = ScalingConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, parsed.error);
    }
    this.config = parsed.data;
    return this.config;
  }

  get(): ScalingConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Options for createArchitecture() carrying the configured capabilities
   * and architecture defaults.
   */
  architectureOptions(): ArchitectureOptions {
    const { capabilities, architectures } = this.get();
    return {
      capabilities,
      numAgents: architectures.numAgents,
      teamSize: architectures.teamSize,
      successPolicy: architectures.successPolicy,
      maxConcurrency: architectures.maxConcurrency,
      maxMessageHistory: architectures.maxMessageHistory,
    };
  }

  /**
   * Install a process-wide logger built from the logging section.
   */
  applyLogging(): void {
    const { logging } = this.get();
    setLogger(createLogger('agent-scaling', { level: logging.level, pretty: logging.pretty }));
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, err instanceof Error ? err : undefined);
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };
    const capabilities = isRecord(result.capabilities) ? { ...result.capabilities } : {};
    const architectures = isRecord(result.architectures) ? { ...result.architectures } : {};
    const logging = isRecord(result.logging) ? { ...result.logging } : {};

    const tokensPerTask = this.numberEnv('AGENT_SCALING_TOKENS_PER_TASK');
    if (tokensPerTask !== undefined) capabilities.tokensPerTask = tokensPerTask;

    const rounds = this.numberEnv('AGENT_SCALING_COORDINATION_ROUNDS');
    if (rounds !== undefined) capabilities.coordinationRounds = rounds;

    const maxConcurrency = this.numberEnv('AGENT_SCALING_MAX_CONCURRENCY');
    if (maxConcurrency !== undefined) architectures.maxConcurrency = maxConcurrency;

    if (this.env.AGENT_SCALING_LOG_LEVEL) {
      logging.level = this.env.AGENT_SCALING_LOG_LEVEL;
    }

    result.capabilities = capabilities;
    result.architectures = architectures;
    result.logging = logging;
    return result;
  }

  private numberEnv(name: string): number | undefined {
    const value = this.env[name];
    if (value === undefined || value === '') return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(`Environment variable ${name} must be a number, got "${value}"`);
    }
    return parsed;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
