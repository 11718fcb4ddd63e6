/**
 * run_program tool — scan, then execute every block in order.
 */

import { z } from 'zod';
import type { FusionService, RunResponse } from '../fusion.js';
import { programShape, securityLevelField, selectProgram } from './program-input.js';

export const runProgramSchema = z.object({
  ...programShape,
  security_level: securityLevelField,
  timeout_ms: z.number().int().positive().nullish()
    .describe('Per-block timeout in milliseconds (default: 20000, capped by FUSION_MAX_TIMEOUT_MS)'),
  strict_toolchains: z.boolean().nullish()
    .describe('Halt on a missing toolchain instead of rendering stub output'),
  seed: z.number().int().nullish()
    .describe('Seed for the native random module'),
});

export type RunProgramInput = z.infer<typeof runProgramSchema>;

export const handleRunProgram = (service: FusionService) =>
  async (input: RunProgramInput): Promise<RunResponse> => {
    const { program, diagnostics } = await selectProgram(service, input);
    return service.run(program, {
      securityLevel: input.security_level ?? undefined,
      timeoutMs: input.timeout_ms ?? undefined,
      strictToolchains: input.strict_toolchains ?? undefined,
      seed: input.seed ?? undefined,
    }, diagnostics);
  };
