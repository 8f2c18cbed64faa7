/**
 * Wharf Lambda Runtime — Function Settings
 *
 * The values the Lambda service sets in every function's environment.
 * All seven are required; the runtime does not start without them.
 */

import { ConfigError } from '@wharf/kernel';
import { z } from 'zod';

const setting = z.string().min(1);

export const FunctionSettingsSchema = z.object({
  AWS_LAMBDA_FUNCTION_NAME: setting,
  AWS_LAMBDA_FUNCTION_VERSION: setting,
  AWS_LAMBDA_LOG_GROUP_NAME: setting,
  AWS_LAMBDA_LOG_STREAM_NAME: setting,
  AWS_LAMBDA_RUNTIME_API: setting,
  LAMBDA_RUNTIME_DIR: setting,
  LAMBDA_TASK_ROOT: setting,
});

export type FunctionSettings = z.infer<typeof FunctionSettingsSchema>;

export function loadFunctionSettings(env: Readonly<Record<string, string | undefined>>): FunctionSettings {
  const parsed = FunctionSettingsSchema.safeParse(env);
  if (!parsed.success) {
    const missing = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))].sort();
    throw new ConfigError('InvalidConfig', `Missing Lambda environment value(s): ${missing.join(', ')}`);
  }
  return parsed.data;
}
