import { randomUUID } from "node:crypto";
import type { IdSource } from "./types";

/** Random v4 UUIDs, the default for real runs. */
export const randomIdSource: IdSource = {
  next: () => randomUUID(),
};

/**
 * Deterministic UUID-shaped ids (`00000000-0000-4000-8000-000000000001`, ...).
 * Used by tests and for reproducible dry runs.
 */
export function createSequentialIdSource(start = 1): IdSource {
  let n = start;
  return {
    next: () => {
      const id = `00000000-0000-4000-8000-${n.toString(16).padStart(12, "0")}`;
      n++;
      return id;
    },
  };
}
