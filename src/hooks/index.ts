/**
 * agentloop hook system
 *
 * Hooks are YAML files in ~/.agentloop/hooks and <cwd>/.agentloop/hooks,
 * each bound to one lifecycle event:
 *
 * ```yaml
 * name: greet
 * trigger: SessionStart
 * actions:
 *   - type: command
 *     command: echo hi
 *     inject_as: greeting
 * ```
 *
 * Events:
 * - SessionStart / SessionEnd: bracket the process
 * - UserPromptSubmit: before each turn's first inference
 * - InferenceComplete: after a turn finishes
 * - PreToolUse: before a tool runs; a declined or blocked command denies the call
 * - PostToolUse: after a tool runs
 * - OnError / OnWarning: provider or tool failures, interrupts, iteration cap
 */

export * from './types.js';
export * from './manager.js';
export * from './runner.js';
