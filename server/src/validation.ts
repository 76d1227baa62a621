import { z } from 'zod';
import { ValidationError } from './errors';

export const createProjectSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  iconData: z.string().nullable().optional()
});

export const updateProjectSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional()
});

export const createTaskSchema = z.object({
  title: z.string(),
  parentTaskId: z.string().nullable().optional(),
  description: z.string().optional()
});

// The status value itself is checked by the store, so a bad value is reported
// with the list of allowed statuses.
export const updateTaskStatusSchema = z.object({
  status: z.string()
});

export const addCommentSchema = z.object({
  text: z.string(),
  author: z.string().optional()
});

/**
 * Parses a request body against `schema`, throwing a ValidationError that
 * lists every failing field.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const errors = result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }));
    throw new ValidationError('Validation failed', { errors });
  }
  return result.data;
}
