import { z } from "zod";
import { NOTE_ORDERS, SOURCE_TYPES } from "../repositories/types.js";

const slug = z.string().trim().min(1, "Slug is required").max(200);

// Tags arrive either as a list or as the comma separated string of the form field
const tagsRule = z
  .union([z.array(z.string()), z.string()])
  .transform((val) => (Array.isArray(val) ? val : val.split(",")))
  .pipe(z.array(z.string().trim().max(50, "Tag must be at most 50 characters")).max(10, "No more than 10 tags"));

const sourceRule = z.object({
  title: z.string().trim().min(1, "Source title is required").max(255),
  type: z.enum(SOURCE_TYPES).default("other"),
  link: z.union([z.url("Invalid source link"), z.literal("")]).default(""),
  description: z.string().trim().max(1000).default(""),
}).strict();

const noteBody = z.object({
  title: z.string().trim().min(1, "Title cannot be empty").max(200, "Title must be at most 200 characters"),
  body: z.string().max(10000, "Note must be at most 10000 characters").default(""),
  tags: tagsRule.default([]),
  anonymous: z.boolean().default(false),
  source: sourceRule.nullish(),
  saveDraft: z.boolean().default(false),
}).strict();

export const slugParams = z.object({ slug });

export const createNoteSchema = z.object({
  body: noteBody,
});

export const updateNoteSchema = z.object({
  params: slugParams,
  body: noteBody,
});

export const downloadParams = z.object({
  slug,
  filetype: z.string().trim().toLowerCase(),
});

export const listQuerySchema = z.object({
  order: z.enum(NOTE_ORDERS).default("-datetime_created"),
  page: z.coerce.number().int().min(1).default(1),
});

export const initialQuerySchema = z.object({
  source: z.string().trim().min(1).optional(),
  tag: z.string().trim().min(1).optional(),
});

export const tagListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

// Extract Types
export type NoteInput = z.infer<typeof noteBody>;
