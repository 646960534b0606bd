import { describe, it, expect } from 'vitest';
import { createToolRegistry } from './tool.js';
import type { RegisteredTool, ToolHandler, ToolSpec } from './tool.js';

function spec(name: string, description = `Tool ${name}`): ToolSpec {
  return { name, description, category: 'filesystem', parameters: [] };
}

const handler: ToolHandler = {
  parse: () => ({
    ok: true,
    call: { invoke: async () => 'result', lockTargets: async () => [] },
  }),
};

function tool(name: string): RegisteredTool {
  return { spec: spec(name), handler };
}

describe('ToolRegistry', () => {
  describe('register and get', () => {
    it('should register a tool and retrieve it', () => {
      const registry = createToolRegistry();

      registry.register(spec('test_tool'), handler);
      const retrieved = registry.get('test_tool');

      expect(retrieved.spec.name).toBe('test_tool');
      expect(retrieved.handler).toBe(handler);
      expect(registry.has('test_tool')).toBe(true);
    });

    it('should throw UnknownTool naming the available tools', () => {
      const registry = createToolRegistry([tool('read_file'), tool('write_file')]);

      expect(registry.has('nonexistent')).toBe(false);
      expect(() => registry.get('nonexistent')).toThrow(
        'Unknown tool: nonexistent. Available tools: read_file, write_file',
      );
    });

    it('should refuse a second registration under the same name', () => {
      const registry = createToolRegistry();
      registry.register(spec('test_tool', 'First version'), handler);

      expect(() => registry.register(spec('test_tool', 'Second version'), handler)).toThrow(
        expect.objectContaining({ kind: 'DuplicateTool' }),
      );
      expect(registry.get('test_tool').spec.description).toBe('First version');
    });
  });

  describe('list', () => {
    it('should return specs in registration order', () => {
      const registry = createToolRegistry();

      registry.register(spec('zeta'), handler);
      registry.register(spec('alpha'), handler);
      registry.register(spec('mid'), handler);

      expect(registry.list().map((entry) => entry.name)).toEqual(['zeta', 'alpha', 'mid']);
    });

    it('should return empty array when empty', () => {
      expect(createToolRegistry().list()).toEqual([]);
    });
  });

  describe('initial tools', () => {
    it('should register initial tools passed to factory', () => {
      const registry = createToolRegistry([tool('tool1'), tool('tool2')]);

      expect(registry.get('tool1').spec).toEqual(spec('tool1'));
      expect(registry.list()).toHaveLength(2);
    });

    it('should reject duplicates among the initial tools', () => {
      expect(() => createToolRegistry([tool('dup'), tool('dup')])).toThrow('Tool already registered: dup');
    });
  });
});
