import { z } from 'zod';

const envSchema = z.object({
  LOTWISE_DEFAULT_TAX_RATE: z
    .string()
    .trim()
    .regex(/^\d*\.?\d+$/, { message: 'Must be a decimal fraction such as 0.15' })
    .refine((val) => Number(val) < 1, { message: 'Must be less than 1' })
    .optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;
type NodeEnv = ValidatedEnv['NODE_ENV'];

let validatedEnv: ValidatedEnv | undefined;
let nodeEnv: NodeEnv | undefined;

function formatEnvIssues(issues: z.ZodIssue[], path?: string): string {
  const lines = issues.map((e) => `  - ${path ?? e.path.join('.')}: ${e.message}`).join('\n');
  return `Environment validation failed:\n${lines}`;
}

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      throw new Error(formatEnvIssues(result.error.issues));
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
  nodeEnv = undefined;
}

/**
 * Tax rate applied when the caller does not pass one.
 * Returns the raw decimal string so callers keep full precision.
 */
export function getDefaultTaxRate(): string | undefined {
  return validateEnv().LOTWISE_DEFAULT_TAX_RATE;
}

/**
 * Get the current NODE_ENV value.
 * Validated on its own, so an invalid LOTWISE_DEFAULT_TAX_RATE does not affect it.
 */
function getNodeEnv(): NodeEnv {
  if (!nodeEnv) {
    const result = envSchema.shape.NODE_ENV.safeParse(process.env['NODE_ENV']);
    if (!result.success) {
      throw new Error(formatEnvIssues(result.error.issues, 'NODE_ENV'));
    }
    nodeEnv = result.data;
  }
  return nodeEnv;
}

/**
 * Whether error output should carry stack traces.
 */
export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}
