import type { z } from 'zod';
import { LlmResponseError } from './errors';

/**
 * Removes Markdown code fences and, when the remaining text is not bare JSON,
 * keeps only the outermost {...} block.
 */
export function extractJsonText(response: string): string {
  const cleaned = response.replace(/```(?:json)?/gi, '').trim();
  if (cleaned.startsWith('{') || cleaned.startsWith('[')) {
    return cleaned;
  }

  const match = cleaned.match(/\{[\s\S]*\}/);
  return match ? match[0] : cleaned;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseJsonResponse<S extends z.ZodTypeAny>(
  response: string,
  schema: S,
  stage: string
): z.infer<S> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonText(response));
  } catch (error) {
    throw new LlmResponseError(
      stage,
      `not valid JSON (${error instanceof Error ? error.message : 'Unknown error'})`,
      response
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new LlmResponseError(stage, formatIssues(result.error.issues), response);
  }
  return result.data;
}
