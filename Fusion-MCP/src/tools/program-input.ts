/**
 * Source selection shared by the tools: inline text, a source file, or a
 * compiled artifact.
 */

import { z } from 'zod';
import { ValidationError } from '@fusion/shared/Types/errors.js';
import { SECURITY_LEVELS } from '../config.js';
import type { FusionService, LoadedSource } from '../fusion.js';
import type { Diagnostic, Program } from '../source/types.js';

export const sourceShape = {
  source: z.string().nullish()
    .describe('Fusion source text'),
  path: z.string().nullish()
    .describe('Path of a fusion source file (alternative to source)'),
};

export const programShape = {
  ...sourceShape,
  artifact_path: z.string().nullish()
    .describe('Path of a compiled artifact (alternative to source/path); with source, the artifact must match it'),
};

export const securityLevelField = z.enum(SECURITY_LEVELS).nullish()
  .describe('Security level: low | medium | high | strict (default from FUSION_SECURITY_LEVEL)');

export interface SourceSelection {
  source?: string | null;
  path?: string | null;
}

export interface ProgramSelection extends SourceSelection {
  artifact_path?: string | null;
}

export interface SelectedProgram {
  program: Program;
  diagnostics: Diagnostic[];
}

export async function selectSource(service: FusionService, input: SourceSelection): Promise<LoadedSource> {
  const given = [input.source, input.path].filter((v) => v !== undefined && v !== null);
  if (given.length !== 1) {
    throw new ValidationError('Provide exactly one of source or path');
  }
  if (input.path) return service.loadSource(input.path);
  return { text: input.source ?? '' };
}

export async function selectProgram(service: FusionService, input: ProgramSelection): Promise<SelectedProgram> {
  if (input.artifact_path) {
    if (input.path) throw new ValidationError('Provide artifact_path or path, not both');
    const program = await service.loadArtifact(input.artifact_path, input.source ?? undefined);
    return { program, diagnostics: [] };
  }
  const source = await selectSource(service, input);
  const { program, diagnostics } = service.build(source.text);
  return { program, diagnostics };
}
