export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  MISSING_REQUIRED_FIELD = 'MISSING_REQUIRED_FIELD',
  UNSUPPORTED_PROVIDER_TYPE = 'UNSUPPORTED_PROVIDER_TYPE',
  PROVIDER_NOT_FOUND = 'PROVIDER_NOT_FOUND',
  MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
  ENV_VAR_NOT_SET = 'ENV_VAR_NOT_SET',
  INVALID_ROUTE_FORMAT = 'INVALID_ROUTE_FORMAT',
  UNKNOWN_CONFIG_FLAG = 'UNKNOWN_CONFIG_FLAG',
  INVALID_FLAG_VALUE = 'INVALID_FLAG_VALUE',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export enum ToolErrorCode {
  UNKNOWN_TOOL = 'UNKNOWN_TOOL',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PATTERN_NOT_FOUND = 'PATTERN_NOT_FOUND',
  AMBIGUOUS_PATTERN = 'AMBIGUOUS_PATTERN',
  PATH_OUTSIDE_WORKING_DIR = 'PATH_OUTSIDE_WORKING_DIR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
}

export class ToolError extends Error {
  public readonly code: ToolErrorCode;
  public readonly toolName?: string;

  constructor(message: string, code: ToolErrorCode, toolName?: string) {
    super(message);
    this.name = 'ToolError';
    this.code = code;
    this.toolName = toolName;

    Object.setPrototypeOf(this, ToolError.prototype);
  }
}

export class ProviderError extends Error {
  public readonly provider: string;
  public readonly cause?: unknown;

  constructor(message: string, provider: string, cause?: unknown) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.cause = cause;

    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

/**
 * Raised when a hook file cannot be read or does not match the hook schema
 */
export class HookParseError extends Error {
  public readonly filePath: string;
  public readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid hook file ${filePath}: ${issues.join('; ')}`);
    this.name = 'HookParseError';
    this.filePath = filePath;
    this.issues = issues;

    Object.setPrototypeOf(this, HookParseError.prototype);
  }
}

/**
 * Normalize an unknown thrown value to a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
