import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager, PROJECT_CONFIG_FILE } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { getLogger } from '../../../src/core/logger.js';

describe('ConfigManager', () => {
  let root: string;
  let projectDir: string;
  let globalDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'agent-scaling-config-'));
    projectDir = join(root, 'project');
    globalDir = join(root, 'global');
    mkdirSync(projectDir);
    mkdirSync(globalDir);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should load defaults when no files exist', () => {
    const manager = new ConfigManager({ projectDir, globalDir, env: {} });
    const config = manager.load();

    expect(config.capabilities.tokensPerTask).toBe(100);
    expect(config.capabilities.coordinationRounds).toBe(2);
    expect(config.architectures.numAgents).toBe(4);
    expect(config.architectures.teamSize).toBe(2);
    expect(config.architectures.successPolicy).toBe('any');
    expect(config.architectures.maxConcurrency).toBeUndefined();
    expect(config.selector.saturationThreshold).toBe(0.45);
    expect(config.logging).toEqual({ level: 'warn', pretty: false });
  });

  it('should merge global, project, env and overrides in order', () => {
    writeFileSync(join(globalDir, 'config.yaml'), [
      'capabilities:',
      '  tokensPerTask: 50',
      '  strategyTokens: 30',
      'architectures:',
      '  numAgents: 6',
    ].join('\n'));
    writeFileSync(join(projectDir, PROJECT_CONFIG_FILE), [
      'capabilities:',
      '  tokensPerTask: 60',
      'architectures:',
      '  successPolicy: majority',
    ].join('\n'));

    const manager = new ConfigManager({
      projectDir,
      globalDir,
      env: { AGENT_SCALING_COORDINATION_ROUNDS: '3', AGENT_SCALING_TOKENS_PER_TASK: '70' },
    });
    const config = manager.load({ architectures: { teamSize: 3 } });

    expect(config.capabilities.tokensPerTask).toBe(70);
    expect(config.capabilities.strategyTokens).toBe(30);
    expect(config.capabilities.coordinationRounds).toBe(3);
    expect(config.architectures.numAgents).toBe(6);
    expect(config.architectures.teamSize).toBe(3);
    expect(config.architectures.successPolicy).toBe('majority');
  });

  it('should read concurrency and log level from the environment', () => {
    const manager = new ConfigManager({
      projectDir,
      globalDir,
      env: { AGENT_SCALING_MAX_CONCURRENCY: '2', AGENT_SCALING_LOG_LEVEL: 'debug' },
    });
    const config = manager.load();

    expect(config.architectures.maxConcurrency).toBe(2);
    expect(config.logging.level).toBe('debug');
  });

  it('should reject non-numeric environment values', () => {
    const manager = new ConfigManager({ projectDir, globalDir, env: { AGENT_SCALING_TOKENS_PER_TASK: 'lots' } });

    expect(() => manager.load()).toThrow(ConfigError);
    expect(() => manager.load()).toThrow('Environment variable AGENT_SCALING_TOKENS_PER_TASK must be a number, got "lots"');
  });

  it('should reject malformed YAML', () => {
    const path = join(projectDir, PROJECT_CONFIG_FILE);
    writeFileSync(path, 'capabilities: [unclosed');
    const manager = new ConfigManager({ projectDir, globalDir, env: {} });

    expect(() => manager.load()).toThrow(`Failed to parse project config at ${path}`);
  });

  it('should reject values outside the schema', () => {
    writeFileSync(join(projectDir, PROJECT_CONFIG_FILE), 'capabilities:\n  coordinationRounds: 0\n');
    const manager = new ConfigManager({ projectDir, globalDir, env: {} });

    expect(() => manager.load()).toThrow(/^Invalid configuration: capabilities\.coordinationRounds: /);
  });

  it('should cache the loaded config', () => {
    const manager = new ConfigManager({ projectDir, globalDir, env: {} });
    const first = manager.get();

    expect(manager.get()).toBe(first);
    expect(manager.getProjectDir()).toBe(projectDir);
    expect(manager.getGlobalDir()).toBe(globalDir);
  });

  it('should build architecture options from the config', () => {
    const manager = new ConfigManager({ projectDir, globalDir, env: {} });
    manager.load({ capabilities: { tokensPerTask: 10 }, architectures: { maxConcurrency: 2 } });
    const options = manager.architectureOptions();

    expect(options.numAgents).toBe(4);
    expect(options.teamSize).toBe(2);
    expect(options.successPolicy).toBe('any');
    expect(options.maxConcurrency).toBe(2);
    expect(options.maxMessageHistory).toBe(1000);
    expect(options.capabilities).toMatchObject({ tokensPerTask: 10, coordinationRounds: 2 });
  });

  it('should install a logger at the configured level', () => {
    const manager = new ConfigManager({ projectDir, globalDir, env: {} });
    manager.load({ logging: { level: 'silent' } });
    manager.applyLogging();

    expect(getLogger().level).toBe('silent');
  });
});
