import { z } from 'zod';
import { parseWithSchema } from '../core/validation.js';

const tokenCost = z.number().int().min(0);

/**
 * Numeric knobs every architecture reads its token costs from.
 * Unknown keys are stripped, missing keys take the defaults below.
 */
export const CapabilitiesSchema = z.object({
  tokensPerTask: tokenCost.default(100),
  coordinationTokensPerTask: tokenCost.default(10),
  communicationTokensPerMessage: tokenCost.default(5),
  coordinationRounds: z.number().int().min(1).default(2),
  strategyTokens: tokenCost.default(20),
  aggregationTokens: tokenCost.default(15),
  teamCommTokens: tokenCost.default(3),
});

export type Capabilities = Readonly<z.output<typeof CapabilitiesSchema>>;

/** Accepted capability input: any mapping; recognized keys are validated. */
export type CapabilityInput = Partial<Capabilities> | Readonly<Record<string, unknown>>;

export const DEFAULT_CAPABILITIES: Capabilities = Object.freeze(CapabilitiesSchema.parse({}));

export function resolveCapabilities(input?: CapabilityInput): Capabilities {
  if (!input) return DEFAULT_CAPABILITIES;
  return Object.freeze(parseWithSchema(CapabilitiesSchema, input, 'capabilities'));
}
