/**
 * Canonical tool name constants.
 *
 * Import these instead of hardcoding tool name strings so a rename is a
 * single-point change for the server and its clients.
 */

export const FUSION_COMPILE_SOURCE = 'compile_source' as const;
export const FUSION_SCAN_PROGRAM = 'scan_program' as const;
export const FUSION_RUN_PROGRAM = 'run_program' as const;
export const FUSION_ANALYZE_SOURCE = 'analyze_source' as const;
export const FUSION_LIST_TOOLCHAINS = 'list_toolchains' as const;

export const FUSION_TOOL_NAMES = [
  FUSION_COMPILE_SOURCE,
  FUSION_SCAN_PROGRAM,
  FUSION_RUN_PROGRAM,
  FUSION_ANALYZE_SOURCE,
  FUSION_LIST_TOOLCHAINS,
] as const;

export type FusionToolName = (typeof FUSION_TOOL_NAMES)[number];
