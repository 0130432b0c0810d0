import { InvalidResponseError } from '@siteline/core';
import type { z } from 'zod';

export const parseCollaboratorPayload = <TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  operation: string
): z.output<TSchema> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidResponseError(operation, issues);
  }
  return parsed.data;
};
