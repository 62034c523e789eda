import { z } from 'zod';

/**
 * Request schemas. Handlers re-parse with these after `validate` so
 * the bodies they work with are typed.
 */

const nameSchema = z
  .string()
  .trim()
  .min(2, 'Name must be between 2 and 100 characters')
  .max(100, 'Name must be between 2 and 100 characters')
  .regex(/^[a-zA-Z\s]+$/, 'Name can only contain letters and spaces');

const emailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .max(120, 'Email must be at most 120 characters')
  .email('Invalid email format');

const passwordSchema = z
  .string()
  .min(6, 'Password must be at least 6 characters long')
  .max(128, 'Password must be at most 128 characters long');

const ageSchema = z
  .number()
  .int('Age must be a whole number')
  .min(1, 'Age must be between 1 and 150')
  .max(150, 'Age must be between 1 and 150')
  .nullable();

export const registerBodySchema = z.object({
  name: nameSchema,
  email: emailSchema,
  password: passwordSchema,
  age: ageSchema.optional(),
});

// Admin creation takes the same fields as self-registration
export const createUserBodySchema = registerBodySchema;

export const loginBodySchema = z.object({
  email: z.string().trim().toLowerCase().email('Invalid email format'),
  password: z.string().min(1, 'Password is required'),
});

export const updateUserBodySchema = z
  .object({
    name: nameSchema.optional(),
    email: emailSchema.optional(),
    password: passwordSchema.optional(),
    age: ageSchema.optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export const userIdParamsSchema = z.object({
  id: z.string().uuid('Invalid user id'),
});

export const searchQuerySchema = z.object({
  q: z
    .string({ required_error: 'Search query required' })
    .trim()
    .min(1, 'Search query required')
    .max(100, 'Search query must be at most 100 characters'),
});

export type RegisterBody = z.infer<typeof registerBodySchema>;
export type LoginBody = z.infer<typeof loginBodySchema>;
export type UpdateUserBody = z.infer<typeof updateUserBodySchema>;
