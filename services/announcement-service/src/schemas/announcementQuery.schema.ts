import { z } from "zod";

// Boolean spellings accepted in query strings, case-insensitive
const TRUE_FLAGS = new Set(["true", "1", "yes", "on", "t", "y"]);
const FALSE_FLAGS = new Set(["false", "0", "no", "off", "f", "n"]);

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_FLAGS.has(value) || FALSE_FLAGS.has(value), {
    message: "Expected a boolean such as true/false, 1/0, yes/no or on/off",
  })
  .optional()
  .transform((value) => value !== undefined && TRUE_FLAGS.has(value));

const text = (fallback: string) => z.string().trim().default(fallback);

/**
 * Query string of GET /announcements. `max_pages` is bounded by the
 * deployment's page limit.
 */
export function announcementQuerySchema(maxPagesLimit: number) {
  return z.object({
    from_date: z.string().optional(),
    to_date: z.string().optional(),
    segment: text("C"),
    submission_type: text("0"),
    category: text(""),
    subcategory: text(""),
    search: text(""),
    max_pages: z.coerce.number().int().min(1).max(maxPagesLimit).optional(),
    probe: flag,
    diag: flag,
  });
}

export type AnnouncementQuery = z.infer<ReturnType<typeof announcementQuerySchema>>;
