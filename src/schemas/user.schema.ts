import { z } from "zod";

export const userSlugParams = z.object({
  slug: z.string().trim().min(1).max(160),
});

export const updateProfileSchema = z.object({
  body: z.object({
    bio: z.string().trim().max(700, "Bio must be at most 700 characters").optional(),
    avatar: z.url("Invalid avatar URL").optional(),
  }).strict(),
});

export type UpdateProfileInput = z.infer<typeof updateProfileSchema>["body"];

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
});
