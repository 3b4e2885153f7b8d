import { z } from 'zod';

export function formatValidationErrors(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `- ${path || '(root)'}: ${issue.message}`;
  });
  return `Schema validation errors:\n${issues.join('\n')}`;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
