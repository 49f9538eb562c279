export { HOOK_EVENTS, isHookEvent, type HookEvent } from './types.js';
export { EventContext, type EventContextData } from './context.js';
export { EventManager, type EventHandler } from './manager.js';
