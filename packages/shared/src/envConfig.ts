import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
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

function formatErrorMessage(context: string, issues: string[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${issue}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'gridlake';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue({ path: issue.path, message: issue.message }));
    throw new EnvConfigError(formatErrorMessage(context, issues), issues);
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

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type RequiredOption = {
  required?: boolean;
};

type DefaultOption<T> = {
  defaultValue?: T;
};

type DescriptionOption = {
  description?: string;
};

export type BooleanVarOptions = DefaultOption<boolean> & DescriptionOption;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (isBlank(value)) {
      return options?.defaultValue ?? false;
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

export type NumberVarOptions = RequiredOption &
  DefaultOption<number> &
  DescriptionOption & {
    min?: number;
    max?: number;
    integer?: boolean;
  };

export function numberVar(options?: NumberVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
      } else {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} has no default` });
      }
      return z.NEVER;
    }

    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(parsed) || (options?.integer && !Number.isInteger(parsed))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be ${options?.integer ? 'an integer' : 'a number'}`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }

    return parsed;
  });
}

export function integerVar(options?: Omit<NumberVarOptions, 'integer'>) {
  return numberVar({ ...options, integer: true });
}

export type StringVarOptions = DescriptionOption & {
  pattern?: RegExp;
  lowercase?: boolean;
};

export function requiredStringVar(options?: StringVarOptions) {
  return optionalStringVar(options).transform((value, ctx) => {
    if (value === undefined) {
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Missing required ${describe(pathName, options?.description)}`
      });
      return z.NEVER;
    }
    return value;
  });
}

export function optionalStringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return undefined;
    }
    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.pattern && !options.pattern.test(normalized)) {
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describe(pathName, options?.description)} does not match expected pattern`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export function stringVar(defaultValue: string, options?: StringVarOptions) {
  return optionalStringVar(options).transform((value) => value ?? defaultValue);
}

export function enumVar<const T extends readonly [string, ...string[]]>(values: T, defaultValue: T[number]) {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value) => (isBlank(value) ? defaultValue : value.trim().toLowerCase()))
    .pipe(z.enum(values));
}

export type JsonVarOptions<T> = DefaultOption<T> & DescriptionOption;

export function jsonVar<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: JsonVarOptions<T>) {
  return z.string().nullable().optional().transform((value, ctx): T | undefined => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (isBlank(value)) {
      return options?.defaultValue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Failed to parse ${description} as JSON` });
      return z.NEVER;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const [firstIssue] = result.error.issues;
      const location = firstIssue && firstIssue.path.length > 0 ? ` at ${firstIssue.path.join('.')}` : '';
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description}${location}: ${firstIssue?.message ?? 'does not match expected structure'}`
      });
      return z.NEVER;
    }
    return result.data;
  });
}

const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2}))?$/;

export function instantVar(defaultValue: string, options?: DescriptionOption) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const raw = isBlank(value) ? defaultValue : value.trim();
    const parsed = ISO_INSTANT.test(raw) ? Date.parse(raw.length === 10 ? `${raw}T00:00:00Z` : raw) : Number.NaN;
    if (!Number.isFinite(parsed)) {
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describe(pathName, options?.description)} must be an ISO-8601 date or instant with an offset`
      });
      return z.NEVER;
    }
    return new Date(parsed);
  });
}

export const envParsers = {
  boolean: booleanVar,
  integer: integerVar,
  number: numberVar,
  string: stringVar,
  optionalString: optionalStringVar,
  requiredString: requiredStringVar,
  enum: enumVar,
  json: jsonVar,
  instant: instantVar
};
