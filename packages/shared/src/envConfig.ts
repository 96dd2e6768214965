import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${location}: ${issue.message}`;
}

/**
 * Parses the environment against a zod object schema whose keys are variable names.
 * All invalid variables are reported together in a single {@link EnvConfigError}.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const source: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'dwdbulk';

  const result = schema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }
  return result.data;
}

function variableName(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path[ctx.path.length - 1];
  return last === undefined ? 'value' : String(last);
}

function presentValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

type CommonOptions<T> = {
  defaultValue?: T;
  description?: string;
};

export function stringVar(options: CommonOptions<string> & { pattern?: RegExp } = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx): string | undefined => {
      const trimmed = presentValue(value);
      if (trimmed === undefined) {
        return options.defaultValue;
      }
      if (options.pattern && !options.pattern.test(trimmed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variableName(ctx, options.description)} does not match expected pattern`
        });
        return z.NEVER;
      }
      return trimmed;
    });
}

export function integerVar(options: CommonOptions<number> & { min?: number; max?: number } = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx): number | undefined => {
      const trimmed = presentValue(value);
      if (trimmed === undefined) {
        return options.defaultValue;
      }
      const name = variableName(ctx, options.description);
      if (!/^-?\d+$/.test(trimmed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${name} to be an integer` });
        return z.NEVER;
      }
      const parsed = Number.parseInt(trimmed, 10);
      if (options.min !== undefined && parsed < options.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be >= ${options.min}` });
        return z.NEVER;
      }
      if (options.max !== undefined && parsed > options.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be <= ${options.max}` });
        return z.NEVER;
      }
      return parsed;
    });
}

export function booleanVar(options: CommonOptions<boolean> = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx): boolean | undefined => {
      const present = presentValue(value);
      if (present === undefined) {
        return options.defaultValue;
      }
      const normalized = present.toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }
      const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${variableName(ctx, options.description)}. Accepted boolean values: ${accepted}`
      });
      return z.NEVER;
    });
}

/**
 * http(s) URL, normalised to end with a slash so relative paths can be joined onto it.
 */
export function urlVar(options: CommonOptions<string> = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx): string | undefined => {
      const raw = presentValue(value) ?? options.defaultValue;
      if (raw === undefined) {
        return undefined;
      }
      let parsed: URL;
      try {
        parsed = new URL(raw);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variableName(ctx, options.description)} must be an absolute URL`
        });
        return z.NEVER;
      }
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variableName(ctx, options.description)} must use http or https`
        });
        return z.NEVER;
      }
      const href = parsed.toString();
      return href.endsWith('/') ? href : `${href}/`;
    });
}

export function logLevelVar(options: CommonOptions<LogLevel> = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx): LogLevel => {
      const present = presentValue(value);
      if (present === undefined) {
        return options.defaultValue ?? 'info';
      }
      const normalized = present.toLowerCase();
      const level = LOG_LEVELS.find((candidate) => candidate === normalized);
      if (!level) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variableName(ctx, options.description)} must be one of ${LOG_LEVELS.join(', ')}`
        });
        return z.NEVER;
      }
      return level;
    });
}
