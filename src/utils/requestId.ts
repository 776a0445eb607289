/**
 * Request ID generation
 */

import { randomUUID } from "node:crypto";

/**
 * Fixed v5 UUID (DNS namespace) returned when the random source fails.
 * Seeing it in logs means UUID generation is broken: treat it as an
 * operational alarm, not a request failure.
 */
export const BROKEN_REQUEST_ID = "cd9bbcae-e076-549f-82bf-a08e8c838dd3";

export type IdSource = () => string;

/**
 * Generate a random request ID, or the sentinel if the source throws
 */
export const generateRequestId = (source: IdSource = randomUUID): string => {
  try {
    const id = source();
    return id || BROKEN_REQUEST_ID;
  } catch {
    return BROKEN_REQUEST_ID;
  }
};

export const isBrokenRequestId = (id: string): boolean => id === BROKEN_REQUEST_ID;
