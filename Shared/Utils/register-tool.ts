/**
 * Tool registration wrapper for McpServer.
 *
 * Handlers return a StandardResponse; the wrapper serializes it as MCP text
 * content and flags thrown errors with `isError` so clients can tell them apart.
 */

import type { z } from 'zod';
import type { StandardResponse } from '../Types/StandardResponse.js';
import { createErrorFromException } from '../Types/StandardResponse.js';

/**
 * Structural interface for McpServer. The permissive signature keeps this
 * package free of a hard dependency on one SDK version.
 */
export interface McpServerLike {
  registerTool(...args: unknown[]): unknown;
}

export interface ToolAnnotations extends Record<string, unknown> {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ToolDefinition<T extends z.AnyZodObject> {
  name: string;
  description: string;
  inputSchema: T;
  annotations?: ToolAnnotations;
  handler: (input: z.infer<NoInfer<T>>) => Promise<StandardResponse>;
}

/**
 * Register a tool. The SDK validates arguments against `inputSchema.shape`
 * (applying defaults) before the callback runs.
 */
export function registerTool<T extends z.AnyZodObject>(
  server: McpServerLike,
  config: ToolDefinition<T>,
): void {
  server.registerTool(
    config.name,
    {
      description: config.description,
      inputSchema: config.inputSchema.shape,
      annotations: config.annotations,
    },
    async (args: Record<string, unknown>): Promise<ToolCallResult> => {
      try {
        // The SDK has already validated args against inputSchema, so the
        // cast is safe; it lives here instead of at every call site.
        const result = await config.handler(args as z.infer<T>);
        return {
          content: [{ type: 'text', text: JSON.stringify(result) }],
        };
      } catch (error) {
        const errorResponse = createErrorFromException(error);
        return {
          content: [{ type: 'text', text: JSON.stringify(errorResponse) }],
          isError: true,
        };
      }
    },
  );
}
