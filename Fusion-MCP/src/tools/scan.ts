/**
 * scan_program tool — security report without running anything.
 */

import { z } from 'zod';
import type { FusionService } from '../fusion.js';
import type { SecurityReport } from '../security/types.js';
import type { Diagnostic } from '../source/types.js';
import { programShape, securityLevelField, selectProgram } from './program-input.js';

export const scanProgramSchema = z.object({
  ...programShape,
  security_level: securityLevelField,
});

export type ScanProgramInput = z.infer<typeof scanProgramSchema>;

export interface ScanProgramResult {
  report: SecurityReport;
  diagnostics: Diagnostic[];
}

export const handleScanProgram = (service: FusionService) =>
  async (input: ScanProgramInput): Promise<ScanProgramResult> => {
    const { program, diagnostics } = await selectProgram(service, input);
    const report = service.scan(program, input.security_level ?? undefined);
    return { report, diagnostics };
  };
