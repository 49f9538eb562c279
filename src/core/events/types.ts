/**
 * Lifecycle events fired by the agent loop
 */
export const HOOK_EVENTS = [
  'SessionStart',
  'SessionEnd',
  'UserPromptSubmit',
  'InferenceComplete',
  'PreToolUse',
  'PostToolUse',
  'OnError',
  'OnWarning',
] as const;

export type HookEvent = (typeof HOOK_EVENTS)[number];

/**
 * Exact, case-sensitive match against the event names
 */
export function isHookEvent(value: unknown): value is HookEvent {
  return typeof value === 'string' && HOOK_EVENTS.some((event) => event === value);
}
