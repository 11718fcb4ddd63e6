/**
 * compile_source tool — source text or file to a compiled artifact.
 */

import { z } from 'zod';
import type { FusionService } from '../fusion.js';
import type { Artifact } from '../ir/artifact.js';
import type { Diagnostic } from '../source/types.js';
import { securityLevelField, selectSource, sourceShape } from './program-input.js';

export const compileSourceSchema = z.object({
  ...sourceShape,
  security_level: securityLevelField,
  output_path: z.string().nullish()
    .describe('Write the artifact to this path as JSON'),
});

export type CompileSourceInput = z.infer<typeof compileSourceSchema>;

export interface CompileSourceResult {
  artifact: Artifact;
  diagnostics: Diagnostic[];
  output_path: string | null;
}

export const handleCompileSource = (service: FusionService) =>
  async (input: CompileSourceInput): Promise<CompileSourceResult> => {
    const source = await selectSource(service, input);
    const { artifact, diagnostics } = await service.compile(source, {
      securityLevel: input.security_level ?? undefined,
      outputPath: input.output_path ?? undefined,
    });
    return { artifact, diagnostics, output_path: input.output_path ?? null };
  };
