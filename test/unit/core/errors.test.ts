import { describe, it, expect } from 'vitest';
import {
  AgentError,
  ConfigError,
  MetricsError,
  ScalingError,
  describeError,
  toError,
} from '../../../src/core/errors.js';
import { parseWithSchema } from '../../../src/core/validation.js';
import { CapabilitiesSchema, resolveCapabilities } from '../../../src/architectures/capabilities.js';

describe('errors', () => {
  it('should carry codes and context', () => {
    const cause = new Error('root');
    const config = new ConfigError('bad config', cause);
    const agent = new AgentError('worker died', 'w1');
    const metrics = new MetricsError('bad input', 'overhead');

    expect(config).toBeInstanceOf(ScalingError);
    expect(config.code).toBe('CONFIG_ERROR');
    expect(config.cause).toBe(cause);
    expect(config.name).toBe('ConfigError');
    expect(agent.code).toBe('AGENT_ERROR');
    expect(agent.agentId).toBe('w1');
    expect(metrics.code).toBe('METRICS_ERROR');
    expect(metrics.metric).toBe('overhead');
  });

  it('should describe any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(new TypeError(''))).toBe('TypeError');
    expect(describeError('plain')).toBe('plain');
    expect(describeError({ code: 42 })).toBe('{"code":42}');
    expect(describeError(undefined)).toBe('undefined');
  });

  it('should wrap non-errors', () => {
    const original = new Error('kept');

    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});

describe('parseWithSchema', () => {
  it('should list every issue with its path', () => {
    expect(() => parseWithSchema(CapabilitiesSchema, { tokensPerTask: -1, coordinationRounds: 0 }, 'capabilities'))
      .toThrow(
        'Invalid capabilities: tokensPerTask: Number must be greater than or equal to 0; '
        + 'coordinationRounds: Number must be greater than or equal to 1',
      );
  });

  it('should label root-level issues', () => {
    expect(() => parseWithSchema(CapabilitiesSchema, 'nope', 'capabilities')).toThrow(
      'Invalid capabilities: (root): Expected object, received string',
    );
  });
});

describe('resolveCapabilities', () => {
  it('should fill in defaults', () => {
    expect(resolveCapabilities()).toEqual({
      tokensPerTask: 100,
      coordinationTokensPerTask: 10,
      communicationTokensPerMessage: 5,
      coordinationRounds: 2,
      strategyTokens: 20,
      aggregationTokens: 15,
      teamCommTokens: 3,
    });
  });
});
