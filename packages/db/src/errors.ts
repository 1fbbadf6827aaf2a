const UNIQUE_VIOLATION_CODES = new Set(["23505", "SQLITE_CONSTRAINT_UNIQUE"]);

/** True when the driver reported a unique-constraint conflict (pg or SQLite). */
export const isUniqueViolation = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string" &&
  UNIQUE_VIOLATION_CODES.has(error.code);
