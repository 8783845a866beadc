/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query/param validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PrincipalSchema = z.string().min(1).max(256);

export const IdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

/** Path parameter ids arrive as strings: plain decimal digits, no leading zero. */
export const IdParamSchema = z
  .string()
  .regex(/^[1-9]\d*$/)
  .transform(Number)
  .pipe(IdSchema);

// =============================================================================
// Asset DTOs
// =============================================================================

export const IssueAssetSchema = z.object({
  owner: PrincipalSchema,
  data: z.string().max(65_536),
});

export type IssueAssetDto = z.infer<typeof IssueAssetSchema>;

// =============================================================================
// Offer DTOs
// =============================================================================

export const CreateOfferSchema = z.object({
  /** null for a public offer */
  recipient: PrincipalSchema.nullable(),
  myAssets: z.array(IdSchema).max(256),
  theirAssets: z.array(IdSchema).max(256),
});

export type CreateOfferDto = z.infer<typeof CreateOfferSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
