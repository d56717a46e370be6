import { z, type ZodTypeAny } from "zod";
import { ServiceError } from "../errors";

const describeIssues = (error: z.ZodError) =>
  error.errors.map((err) => ({
    path: err.path.join("."),
    message: err.message,
  }));

/** Parses `value` with the schema or throws a ValidationError listing every issue. */
export const parseWith = <T extends ZodTypeAny>(schema: T, value: unknown, what = "request body"): z.infer<T> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = describeIssues(parsed.error);
    const summary = details.map((d) => (d.path ? `${d.path}: ${d.message}` : d.message)).join("; ");
    throw new ServiceError("ValidationError", `invalid ${what}: ${summary}`, { details: { issues: details } });
  }
  return parsed.data;
};
