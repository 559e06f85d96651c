import { z } from 'zod';
import { Password, PASSWORD_MIN_LENGTH } from '../../domain/auth/password.js';
import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  TODO_STATUSES,
} from '../../domain/todo/todo.js';

const passwordSchema = z
  .string()
  .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
  .superRefine((value, ctx) => {
    for (const message of Password.complexityViolations(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });

/**
 * ISO-8601 date-time, strictly after the moment it is validated. A value
 * without an offset is read as server local time. Not re-checked once the
 * request has been accepted.
 */
const futureDateSchema = z
  .string()
  .datetime({ offset: true, local: true })
  .transform((value) => new Date(value))
  .refine((date) => date.getTime() > Date.now(), {
    message: 'due_date must be in the future',
  });

const titleSchema = z.string().min(1).max(60);
const descriptionSchema = z.string().min(1);
const statusSchema = z.enum(TODO_STATUSES);

export const registerBodySchema = z.object({
  email: z.string().email().max(255),
  username: z.string().min(3).max(50),
  password: passwordSchema,
});

/**
 * OAuth2 password form: the email travels in the `username` field.
 */
export const loginBodySchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

// A `status` sent on creation is dropped by z.object's default stripping
export const createTodoBodySchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  due_date: futureDateSchema.optional(),
});

export const updateTodoBodySchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
  status: statusSchema.optional(),
  due_date: futureDateSchema.nullable().optional(),
});

export const listTodosQuerySchema = z.object({
  status_filter: statusSchema.optional(),
  skip: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
});

export const todoIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export type RegisterBody = z.infer<typeof registerBodySchema>;
export type UpdateTodoBody = z.infer<typeof updateTodoBodySchema>;
