import { z } from 'zod';
import type { PermissionFlags, UserAccount } from '../../core/types.js';

// Server ids are int64 today but treated as opaque strings by the harness
export const resourceIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((id) => String(id));

export const createdResourceSchema = z.object({ id: resourceIdSchema }).passthrough();

export const userAccountSchema = z
  .object({
    id: resourceIdSchema,
    username: z.string(),
    can_view: z.boolean(),
    can_create: z.boolean(),
    can_edit: z.boolean(),
    can_delete: z.boolean(),
    is_admin: z.boolean(),
  })
  .passthrough();

export const userListSchema = z.array(userAccountSchema);

export const contentTypeSchema = z.enum(['image', 'audio', 'file']);

export const createDatabaseBodySchema = z.object({
  name: z.string().min(1),
  content_type: contentTypeSchema,
  custom_fields: z.array(z.object({ name: z.string().min(1), type: z.string().min(1) })),
});

export const createUserBodySchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  can_view: z.boolean(),
  can_create: z.boolean(),
  can_edit: z.boolean(),
  can_delete: z.boolean(),
  is_admin: z.boolean(),
});

export const updateUserBodySchema = createUserBodySchema
  .omit({ username: true, password: true })
  .partial();

export type CreateUserBody = z.infer<typeof createUserBodySchema>;
export type UpdateUserBody = z.infer<typeof updateUserBodySchema>;
export type CreateDatabaseBody = z.infer<typeof createDatabaseBodySchema>;

export function toUserAccount(raw: z.infer<typeof userAccountSchema>): UserAccount {
  const flags: PermissionFlags = {
    can_view: raw.can_view,
    can_create: raw.can_create,
    can_edit: raw.can_edit,
    can_delete: raw.can_delete,
    is_admin: raw.is_admin,
  };
  return { id: raw.id, username: raw.username, ...flags };
}
