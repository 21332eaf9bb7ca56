/**
 * ToolRegistry Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ToolRegistry } from './tool-registry.js';
import type { ToolDefinition } from './tool-definition.js';
import { EchoTool } from '../test-setup.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    debug: vi.fn(),
  })),
  describeError: vi.fn((error: unknown) => ({ error: String(error) })),
}));

const echoDefinition: ToolDefinition = {
  id: 'EchoTool',
  settings: { token: { type: 'string', required: true } },
  create: () => new EchoTool(),
};

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  describe('registration', () => {
    it('registers tools by name', () => {
      registry.register(new EchoTool());

      expect(registry.hasTool('echo')).toBe(true);
      expect(registry.listAvailableTools()).toEqual(['echo']);
      expect(registry.size).toBe(1);
    });

    it('replaces a tool registered under the same name', () => {
      const first = new EchoTool();
      const second = new EchoTool();
      registry.register(first);
      registry.register(second);

      expect(registry.size).toBe(1);
      expect(registry.getTool('echo')).toBe(second);
    });

    it('registers definitions whose settings resolve', () => {
      expect(registry.registerDefinitions([echoDefinition], { ECHOTOOL_TOKEN: 'test-token' })).toEqual(['echo']);
    });

    it('skips definitions with missing settings', () => {
      expect(registry.registerDefinitions([echoDefinition], {})).toEqual([]);
      expect(registry.size).toBe(0);
    });
  });

  describe('lookup', () => {
    it('throws TOOL_NOT_FOUND for unknown tools', () => {
      expect(() => registry.getTool('nope')).toThrowError("Tool 'nope' not found");
      expect(() => registry.getToolHelp('nope')).toThrowError("Tool 'nope' not found");
    });

    it('returns schemas and help', () => {
      const tool = new EchoTool();
      registry.register(tool);

      expect(registry.getToolSchemas()).toEqual([tool.getSchema()]);
      expect(registry.getToolHelp('echo')).toBe(tool.help);
    });
  });

  describe('executeTool', () => {
    beforeEach(() => {
      registry.register(new EchoTool());
    });

    it('validates and executes', async () => {
      await expect(registry.executeTool('echo', { text: 'hi', times: 2, mode: 'loud' })).resolves.toEqual({ echo: 'HI HI' });
    });

    it('returns validation failures as error results', async () => {
      await expect(registry.executeTool('echo', {})).resolves.toEqual({
        error: 'Missing required parameter: text',
        tool: 'echo',
      });
    });

    it('returns execution failures as error results', async () => {
      await expect(registry.executeTool('echo', { text: 'fail' })).resolves.toEqual({ error: 'echo failed', tool: 'echo' });
    });

    it('rejects unknown tools', async () => {
      await expect(registry.executeTool('nope', {})).rejects.toMatchObject({ code: 'TOOL_NOT_FOUND' });
    });
  });
});
