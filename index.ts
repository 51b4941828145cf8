/**
 * learning-response-review
 *
 * Grades incident learning reports against rubric dimensions, one
 * collaborator call per dimension, and aggregates the verdicts into a report.
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
