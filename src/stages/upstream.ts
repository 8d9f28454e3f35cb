/**
 * Upstream Result Access
 *
 * @module stages/upstream
 */

import type { z } from 'zod';
import type { StageInvocation } from '../pipeline/types.js';

/**
 * Parse the output of an earlier stage.
 *
 * @throws Error if the stage has no result or the result does not match
 */
export function requireStageResult<T extends z.ZodTypeAny>(
  invocation: StageInvocation,
  stage: string,
  schema: T
): z.output<T> {
  const raw = invocation.results[stage];
  if (raw === undefined || raw === null) {
    throw new Error(`Missing ${stage} output`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${stage} output: ${issues}`);
  }
  return parsed.data;
}

/**
 * Parse the output of an earlier stage that may have been skipped or
 * failed under a `continue` policy.
 */
export function optionalStageResult<T extends z.ZodTypeAny>(
  invocation: StageInvocation,
  stage: string,
  schema: T
): z.output<T> | undefined {
  const parsed = schema.safeParse(invocation.results[stage]);
  return parsed.success ? parsed.data : undefined;
}
