/**
 * Path parameter parsing shared by the resource routes.
 */

import { IdParamSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

/**
 * @throws ApiError VALIDATION_ERROR unless `raw` is a positive integer
 */
export function parseIdParam(raw: string, resource: string): number {
  const result = IdParamSchema.safeParse(raw);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", `Invalid ${resource} id '${raw}'`);
  }
  return result.data;
}
