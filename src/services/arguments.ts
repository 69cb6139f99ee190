import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";

// Optional bucket prefix and @version suffix, e.g. "extras/vscode" or "python@3.12.1".
export const PackageNameSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9][\w.+@/-]*$/, "not a valid package name");

export const SearchQuerySchema = z
  .string()
  .trim()
  .min(1, "search query is empty")
  .max(200, "search query is longer than 200 characters")
  .refine((query) => !query.startsWith("-"), "search query must not start with '-'");

export function validatePackageName(name: string): string {
  return check(PackageNameSchema, name, "package name");
}

export function validateSearchQuery(query: string): string {
  return check(SearchQuerySchema, query, "search query");
}

function check(schema: z.ZodType<string, z.ZodTypeDef, string>, value: string, label: string): string {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join(", ");
    throw new InvalidArgumentError(`Invalid ${label} ${JSON.stringify(value)}: ${reason}`);
  }
  return parsed.data;
}
