export type PluginLoadErrorCode =
  | 'read_failed'
  | 'transpile_failed'
  | 'resolution_failed'
  | 'evaluation_failed';

export class PluginLoadError extends Error {
  readonly code: PluginLoadErrorCode;
  readonly filePath: string;
  readonly specifier?: string;

  constructor(options: {
    code: PluginLoadErrorCode;
    filePath: string;
    message: string;
    specifier?: string;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PluginLoadError';
    this.code = options.code;
    this.filePath = options.filePath;
    this.specifier = options.specifier;
  }
}

export class InstantiationError extends Error {
  readonly filePath: string;
  readonly className: string;

  constructor(options: { filePath: string; className: string; cause: unknown }) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Could not instantiate ${options.className}: ${reason}`, { cause: options.cause });
    this.name = 'InstantiationError';
    this.filePath = options.filePath;
    this.className = options.className;
  }
}

export class TemplateRetrievalError extends Error {
  readonly method: string;

  constructor(options: { method: string; cause: unknown }) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`${options.method}() failed: ${reason}`, { cause: options.cause });
    this.name = 'TemplateRetrievalError';
    this.method = options.method;
  }
}
