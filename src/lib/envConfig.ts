import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  options?: LoadEnvConfigOptions
): z.output<TSchema> {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'keep-sim';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function variableName(path: (string | number)[]): string {
  const last = path.length > 0 ? path[path.length - 1] : undefined;
  return last === undefined ? 'value' : String(last);
}

export type BooleanVarOptions = {
  defaultValue: boolean;
};

export function booleanVar(options: BooleanVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    if (value === undefined || value.trim() === '') {
      return options.defaultValue;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES]
      .map((entry) => `'${entry}'`)
      .join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${variableName(ctx.path)}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = {
  defaultValue?: number;
  min?: number;
  max?: number;
};

export function integerVar(options: IntegerVarOptions = {}) {
  return z.string().optional().transform((value, ctx) => {
    const name = variableName(ctx.path);

    if (value === undefined || value.trim() === '') {
      return options.defaultValue;
    }

    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${name} to be an integer`
      });
      return z.NEVER;
    }

    if (options.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    if (options.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type EnumVarOptions<T extends string> = {
  values: readonly [T, ...T[]];
  defaultValue: T;
};

export function enumVar<T extends string>(options: EnumVarOptions<T>) {
  const allowed = new Set<string>(options.values);
  const isAllowed = (candidate: string): candidate is T => allowed.has(candidate);

  return z.string().optional().transform((value, ctx) => {
    const normalized = value?.trim().toLowerCase() ?? '';
    if (normalized.length === 0) {
      return options.defaultValue;
    }
    if (isAllowed(normalized)) {
      return normalized;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${variableName(ctx.path)}. Expected one of: ${options.values.join(', ')}`
    });
    return z.NEVER;
  });
}
