/**
 * Shared Zod schemas for API input validation.
 * Used by the support routes to validate request bodies.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable atoms
// ---------------------------------------------------------------------------

export const emailSchema = z.string().trim().toLowerCase().email("Invalid email address").max(254);
export const userIdSchema = z.number({ invalid_type_error: "userId must be a number" }).int().positive();
export const nameSchema = z.string().max(128).trim();

export const attachmentSchema = z.object({
  kind: z.enum(["photo", "document", "video"]),
  fileRef: z.string().min(1, "fileRef is required").max(512),
});

// ---------------------------------------------------------------------------
// Route-specific schemas
// ---------------------------------------------------------------------------

/** POST /api/support/messages */
export const supportMessageSchema = z
  .object({
    userId: userIdSchema,
    text: z.string().max(10000).optional(),
    attachment: attachmentSchema.optional(),
    email: emailSchema.optional(),
    displayName: nameSchema.optional(),
    username: nameSchema.optional(),
    startNew: z.boolean().optional(),
  })
  .refine((body) => !!body.text?.trim() || !!body.attachment, {
    message: "text or attachment is required",
  });

export type SupportMessageBody = z.infer<typeof supportMessageSchema>;

/** POST /api/support/feedback */
export const feedbackSchema = z.object({
  userId: userIdSchema,
  rating: z.number().int().min(1, "rating must be 1-5").max(5, "rating must be 1-5"),
  comment: z.string().max(2000).optional(),
  category: z.string().min(1).max(64).optional(),
});

/** POST /api/support/tickets/:ticketId/close */
export const closeTicketSchema = z.object({
  closedBy: z.union([userIdSchema, z.literal("system")]),
});

/** POST /api/support/tickets/:ticketId/reopen */
export const reopenTicketSchema = z.object({
  reopenedBy: userIdSchema,
});

/** GET /api/support/urgent */
export const urgentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

/** GET /api/support/tickets */
export const ticketSearchQuerySchema = z.object({
  q: z.string().trim().max(200).optional(),
  userId: z.coerce.number().int().positive().optional(),
  status: z.enum(["open", "closed"]).optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
});
