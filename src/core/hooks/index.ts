export { HookExecutor, DEFAULT_MAX_INJECT_LENGTH, DEFAULT_COMMAND_TIMEOUT, BLOCK_EXIT_CODE } from './executor.js';
export type { HookExecutorOptions, ConfigFlagWriter } from './executor.js';
export { ConditionEvaluator, SystemConditionEnvironment } from './conditions.js';
export type { ConditionEnvironment, ConfigFlagReader, HookLocalContext } from './conditions.js';
export { HookRegistry, loadHooksFromDirectory } from './registry.js';
export type { HookLoadOptions } from './registry.js';
export { parseHookDocument, parseHookFile, isHookFileName, HookActionSchema, HookDefinitionSchema } from './parser.js';
