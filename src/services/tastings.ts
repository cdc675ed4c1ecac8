import { AppDatabase, isUniqueViolation } from "../db.js";
import type { Logger } from "../lib/logger.js";
import type { InfusionInput, Tasting, TastingInput } from "../types.js";

export const MAX_PHOTOS = 3;
const MAX_CREATE_ATTEMPTS = 2;

export class TastingCreateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TastingCreateError";
  }
}

/**
 * Writes a tasting with its infusions and photos in one transaction.
 * A sequence-number collision retries the whole write once.
 */
export function createTasting(
  db: AppDatabase,
  input: TastingInput,
  infusions: InfusionInput[],
  photoIds: string[],
  logger?: Logger
): Tasting {
  if (photoIds.length > MAX_PHOTOS) {
    throw new RangeError(`At most ${MAX_PHOTOS} photos per tasting, got ${photoIds.length}`);
  }

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt += 1) {
    try {
      return db.insertTastingGraph(input, infusions, photoIds);
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }

      lastError = error;
      logger?.warn({ userId: input.userId, attempt }, "Sequence number collision on tasting insert");
    }
  }

  throw new TastingCreateError(
    `Failed to create tasting for user ${input.userId} after ${MAX_CREATE_ATTEMPTS} attempts`,
    { cause: lastError }
  );
}
