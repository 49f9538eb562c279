/**
 * ToolRegistry Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ToolRegistry } from '../../../src/agent/tool-registry.js';
import { ToolErrorCode } from '../../../src/core/errors/index.js';
import { EchoTool } from '../../helpers/fakes.js';

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    registry.register(new EchoTool());
  });

  it('should look tools up by name', () => {
    expect(registry.has('echo')).toBe(true);
    expect(registry.get('echo')?.name).toBe('echo');
    expect(registry.getNames()).toEqual(['echo']);
    expect(registry.size).toBe(1);
  });

  it('should replace a tool with the same name', () => {
    registry.registerAll([new EchoTool()]);
    expect(registry.getAll()).toHaveLength(1);
  });

  it('should return tool output', async () => {
    expect(await registry.execute('echo', { text: 'hi' })).toEqual({ ok: true, output: 'hi' });
  });

  it('should report an unknown tool', async () => {
    const result = await registry.execute('missing', {});
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ToolErrorCode.UNKNOWN_TOOL);
      expect(result.error.message).toBe('Unknown tool: missing');
    }
  });

  it('should report arguments that fail the schema', async () => {
    const result = await registry.execute('echo', { text: 42 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ToolErrorCode.INVALID_ARGUMENTS);
      expect(result.error.message).toMatch(/^Invalid arguments for echo: /);
    }
  });

  it('should pass ToolErrors through', async () => {
    const result = await registry.execute('echo', { text: 'tool-error' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ToolErrorCode.COMMAND_FAILED);
      expect(result.error.message).toBe('refused');
    }
  });

  it('should wrap other failures', async () => {
    const result = await registry.execute('echo', { text: 'crash' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ToolErrorCode.EXECUTION_FAILED);
      expect(result.error.message).toBe('unexpected');
    }
  });
});
