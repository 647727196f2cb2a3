import { z } from 'zod';
import { CapabilitiesSchema } from '../architectures/capabilities.js';
import { SelectorCoefficientsSchema } from '../selector/types.js';

// ===== Configuration =====

export const ScalingConfigSchema = z.object({
  capabilities: CapabilitiesSchema.default({}),
  selector: SelectorCoefficientsSchema.default({}),
  architectures: z.object({
    numAgents: z.number().int().min(1).default(4),
    teamSize: z.number().int().min(1).default(2),
    successPolicy: z.enum(['any', 'majority', 'all']).default('any'),
    /** Cap on concurrently running workers or teams; unset means no cap. */
    maxConcurrency: z.number().int().min(1).optional(),
    maxMessageHistory: z.number().int().min(0).default(1000),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type ScalingConfig = z.output<typeof ScalingConfigSchema>;
export type ScalingConfigInput = z.input<typeof ScalingConfigSchema>;
