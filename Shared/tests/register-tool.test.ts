import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { registerTool, type ToolCallResult } from '../Utils/register-tool.js';
import { ValidationError } from '../Types/errors.js';

function createMockServer() {
  return { registerTool: vi.fn() };
}

type RegisteredHandler = (args: Record<string, unknown>) => Promise<ToolCallResult>;

function registeredHandler(server: ReturnType<typeof createMockServer>): RegisteredHandler {
  return server.registerTool.mock.calls[0][2] as RegisteredHandler;
}

describe('registerTool', () => {
  it('should pass name, description, schema shape, and annotations to the server', () => {
    const server = createMockServer();
    const schema = z.object({ source: z.string(), level: z.string() });
    const annotations = { readOnlyHint: true, destructiveHint: false };

    registerTool(server, {
      name: 'scan',
      description: 'Scan a program',
      inputSchema: schema,
      annotations,
      handler: async () => ({ success: true }),
    });

    expect(server.registerTool).toHaveBeenCalledOnce();
    const [name, config] = server.registerTool.mock.calls[0];
    expect(name).toBe('scan');
    expect(config.description).toBe('Scan a program');
    expect(config.inputSchema).toBe(schema.shape);
    expect(config.annotations).toEqual(annotations);
  });

  describe('handler wrapper', () => {
    it('should serialize a successful result as text content', async () => {
      const server = createMockServer();
      registerTool(server, {
        name: 'count',
        description: 'count',
        inputSchema: z.object({}),
        handler: async () => ({ success: true, data: { count: 5 } }),
      });

      const result = await registeredHandler(server)({});
      expect(result.isError).toBeUndefined();
      expect(JSON.parse(result.content[0].text)).toEqual({ success: true, data: { count: 5 } });
    });

    it('should flag thrown errors with isError and keep the error code', async () => {
      const server = createMockServer();
      registerTool(server, {
        name: 'validate',
        description: 'validates',
        inputSchema: z.object({}),
        handler: async () => {
          throw new ValidationError('bad level', { field: 'level' });
        },
      });

      const result = await registeredHandler(server)({});
      expect(result.isError).toBe(true);
      const parsed = JSON.parse(result.content[0].text);
      expect(parsed.success).toBe(false);
      expect(parsed.error).toBe('bad level');
      expect(parsed.errorCode).toBe('VALIDATION_ERROR');
      expect(parsed.errorDetails.field).toBe('level');
    });

    it('should pass input arguments to the handler', async () => {
      const server = createMockServer();
      const received = vi.fn();
      registerTool(server, {
        name: 'echo',
        description: 'echo',
        inputSchema: z.object({ msg: z.string() }),
        handler: async (input) => {
          received(input.msg);
          return { success: true };
        },
      });

      await registeredHandler(server)({ msg: 'hello' });
      expect(received).toHaveBeenCalledWith('hello');
    });
  });
});
