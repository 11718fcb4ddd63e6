/**
 * analyze_source tool — structure and line statistics.
 */

import { z } from 'zod';
import type { FusionService, SourceAnalysis } from '../fusion.js';
import { selectSource, sourceShape } from './program-input.js';

export const analyzeSourceSchema = z.object(sourceShape);

export type AnalyzeSourceInput = z.infer<typeof analyzeSourceSchema>;

export const handleAnalyzeSource = (service: FusionService) =>
  async (input: AnalyzeSourceInput): Promise<SourceAnalysis> => {
    const source = await selectSource(service, input);
    return service.analyze(source.text);
  };
