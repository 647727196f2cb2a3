export class ScalingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ScalingError';
  }
}

export class ConfigError extends ScalingError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class MetricsError extends ScalingError {
  constructor(message: string, public readonly metric: string) {
    super(message, 'METRICS_ERROR');
    this.name = 'MetricsError';
  }
}

export class AgentError extends ScalingError {
  constructor(message: string, public readonly agentId: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

/**
 * Render any thrown value as a message suitable for `TaskResult.error`.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(describeError(err));
}
