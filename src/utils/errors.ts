export class ParleyError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'ParleyError';
  }
}

export class ConfigurationError extends ParleyError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Session backend could not be reached. Never surfaced to the user:
 * the session store treats it as "no history" / "write skipped".
 */
export class CacheUnavailableError extends ParleyError {
  constructor(message: string) {
    super(message, 'CACHE_UNAVAILABLE');
    this.name = 'CacheUnavailableError';
  }
}

export class PersistenceError extends ParleyError {
  constructor(message: string, public key?: string) {
    super(message, 'PERSISTENCE_FAILED');
    this.name = 'PersistenceError';
  }
}

export class ToolConnectError extends ParleyError {
  constructor(message: string, public providerName: string, code: string = 'TOOL_CONNECT_FAILED') {
    super(message, code);
    this.name = 'ToolConnectError';
  }
}

export class ToolConnectTimeoutError extends ToolConnectError {
  constructor(providerName: string, public timeoutMs: number) {
    super(`Connection to tool provider '${providerName}' timed out after ${timeoutMs}ms`, providerName, 'TOOL_CONNECT_TIMEOUT');
    this.name = 'ToolConnectTimeoutError';
  }
}

export class ToolCallError extends ParleyError {
  constructor(message: string, public toolName?: string) {
    super(message, 'TOOL_CALL_ERROR');
    this.name = 'ToolCallError';
  }
}

export class PreprocessingError extends ParleyError {
  constructor(message: string) {
    super(message, 'PREPROCESSING_FAILED');
    this.name = 'PreprocessingError';
  }
}

export class ModelInvocationError extends ParleyError {
  constructor(
    message: string,
    public retryable: boolean = false,
    public attempts: number = 1,
    public modelName?: string
  ) {
    super(message, 'MODEL_INVOCATION_FAILED');
    this.name = 'ModelInvocationError';
  }
}

export class TurnCancelledError extends ParleyError {
  constructor(message: string = 'Turn cancelled') {
    super(message, 'TURN_CANCELLED');
    this.name = 'TurnCancelledError';
  }
}

export class TimeoutError extends ParleyError {
  constructor(message: string, public timeoutMs: number) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RetryError extends ParleyError {
  constructor(public lastError: unknown, public attempts: number) {
    super(`Failed after ${attempts} attempts: ${errorMessage(lastError)}`, 'RETRY_EXHAUSTED');
    this.name = 'RetryError';
  }
}

export class ContentFetchError extends ParleyError {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    public retryable: boolean = false
  ) {
    super(message, 'CONTENT_FETCH_FAILED');
    this.name = 'ContentFetchError';
  }
}
