/**
 * list_toolchains tool — which languages execute and which fall back to stubs.
 */

import { z } from 'zod';
import type { ToolchainStatus } from '../executors/registry.js';
import type { FusionService } from '../fusion.js';

export const listToolchainsSchema = z.object({});

export type ListToolchainsInput = z.infer<typeof listToolchainsSchema>;

export const handleListToolchains = (service: FusionService) =>
  async (_input: ListToolchainsInput): Promise<{ toolchains: ToolchainStatus[] }> => {
    return { toolchains: await service.listToolchains() };
  };
