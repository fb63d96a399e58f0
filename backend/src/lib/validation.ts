import { z } from 'zod';
import { HTTPException } from 'hono/http-exception';
import { INSTANCE_TYPE_NAMES } from '../services/instanceTypes';

/**
 * Service naming rules:
 * - Must be 63 characters or less
 * - Must start with a lowercase letter or digit
 * - Can contain lowercase alphanumeric, hyphens and underscores
 */
export const serviceNameSchema = z
  .string()
  .min(1, 'Service cannot be empty')
  .max(63, 'Service must be 63 characters or less')
  .regex(
    /^[a-z0-9][a-z0-9_-]*$/,
    'Service must be lowercase alphanumeric with hyphens/underscores, starting with alphanumeric'
  );

/**
 * Instance naming rules:
 * - Must be 63 characters or less
 * - Must start with a letter or digit
 * - Can contain alphanumeric, hyphens, underscores and dots
 */
export const instanceNameSchema = z
  .string()
  .min(1, 'Instance cannot be empty')
  .max(63, 'Instance must be 63 characters or less')
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
    'Instance must be alphanumeric with hyphens/underscores/dots, starting with alphanumeric'
  );

export const instanceTypeSchema = z.enum(INSTANCE_TYPE_NAMES);

/**
 * Boolean query flag: 'true' / '1' are true, 'false' / '0' are false,
 * absent takes the default
 */
export function booleanQuery(defaultValue: boolean) {
  return z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true' || val === '1'));
}

export const verboseQuery = z
  .string()
  .optional()
  .transform((val) => (val ? parseInt(val, 10) : 0))
  .pipe(z.number().int().min(0).max(3));

export const instanceParamsSchema = z.object({
  service: serviceNameSchema,
  instance: instanceNameSchema,
});

export const instanceStatusQuerySchema = z.object({
  type: instanceTypeSchema.optional(),
  verbose: verboseQuery,
  includeSmartstack: booleanQuery(false),
  includeEnvoy: booleanQuery(false),
  new: booleanQuery(false),
});

export const meshStatusQuerySchema = z.object({
  type: instanceTypeSchema.optional(),
  verbose: verboseQuery,
  includeSmartstack: booleanQuery(true),
  includeEnvoy: booleanQuery(true),
});

export const setDesiredStateBodySchema = z.object({
  desiredState: z.enum(['start', 'stop']),
});

/**
 * Format zod issues the way the API reports them
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * zValidator hook: reject invalid input with a 400 in the API's error shape
 */
export function rejectInvalid(result: { success: true } | { success: false; error: z.ZodError }): void {
  if (!result.success) {
    throw new HTTPException(400, { message: `Invalid request: ${formatIssues(result.error)}` });
  }
}
