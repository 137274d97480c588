import path from 'node:path';

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

function formatIssue({ path: issuePath, message }: EnvIssueTarget): string {
  const location = issuePath.length > 0 ? issuePath.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: LoadEnvConfigOptions
): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'point-obs';

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

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

const lastPathSegment = (ctx: z.RefinementCtx): string | number | undefined =>
  ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;

const isBlank = (value: unknown): value is null | undefined | '' =>
  value === null || value === undefined || (typeof value === 'string' && value.trim() === '');

type RequiredOption = {
  required?: boolean;
};

type DefaultOption<T> = {
  defaultValue?: T;
};

type DescriptionOption = {
  description?: string;
};

const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

export type BooleanVarOptions = DefaultOption<boolean> & DescriptionOption;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const description = describe(lastPathSegment(ctx), options?.description);

    if (isBlank(value)) {
      return options?.defaultValue;
    }
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = RequiredOption &
  DefaultOption<number> &
  DescriptionOption & {
    min?: number;
    max?: number;
  };

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describe(lastPathSegment(ctx), options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = RequiredOption &
  DefaultOption<string> &
  DescriptionOption & {
    lowercase?: boolean;
  };

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describe(lastPathSegment(ctx), options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const trimmed = value.trim();
    return options?.lowercase ? trimmed.toLowerCase() : trimmed;
  });
}

export type PathVarOptions = StringVarOptions & {
  /** Relative paths resolve against this directory; defaults to the working directory. */
  baseDir?: string;
};

export function pathVar(options?: PathVarOptions) {
  return stringVar(options).transform((value) =>
    value === undefined ? undefined : path.resolve(options?.baseDir ?? process.cwd(), value)
  );
}

export type StringListOptions = RequiredOption &
  DefaultOption<string[]> &
  DescriptionOption & {
    separator?: RegExp | string;
    unique?: boolean;
  };

export function stringListVar(options?: StringListOptions) {
  return z.union([z.string(), z.array(z.string())]).nullable().optional().transform((value, ctx) => {
    const description = describe(lastPathSegment(ctx), options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return [];
    }

    const separator = options?.separator ?? DEFAULT_LIST_SEPARATOR;
    const list = (Array.isArray(value) ? value : value.split(separator))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);

    return options?.unique ? Array.from(new Set(list)) : list;
  });
}

const RANGE_BRACKETS = /^\[(.*)\]$/;

/** Two numbers written as `a,b` or `[a, b]`. */
export function numberRangeVar(options?: DescriptionOption) {
  return z.string().nullable().optional().transform((value, ctx): [number, number] | undefined => {
    const description = describe(lastPathSegment(ctx), options?.description);

    if (isBlank(value)) {
      return undefined;
    }

    const trimmed = value.trim();
    const inner = RANGE_BRACKETS.exec(trimmed)?.[1] ?? trimmed;
    const parts = inner.split(',').map((part) => part.trim());
    const [lower, upper] = parts.map(Number);
    if (parts.length !== 2 || parts.some((part) => part === '') || !Number.isFinite(lower) || !Number.isFinite(upper)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be two numbers written as 'a,b' or '[a, b]'`
      });
      return z.NEVER;
    }
    return [lower, upper];
  });
}

export type HostPortOptions = {
  defaultHost?: string;
  defaultPort?: number;
};

export const hostVar = (options?: HostPortOptions) =>
  stringVar({
    defaultValue: options?.defaultHost ?? '127.0.0.1',
    description: 'host'
  });

export const portVar = (options?: HostPortOptions) =>
  integerVar({
    defaultValue: options?.defaultPort ?? 3000,
    min: 0,
    max: 65535,
    description: 'port'
  });
