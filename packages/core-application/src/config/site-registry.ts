import { z, ZodError } from "zod";
import type { SiteSpec } from "@sitevault/core-domain";

import { ConfigurationError } from "../application/errors";

const nonEmpty = (label: string) => z.string().trim().min(1, `${label} is required`);

export const siteSpecSchema = z.object({
  sourcePath: nonEmpty("sourcePath"),
  outputLabel: nonEmpty("outputLabel").regex(
    /^[A-Za-z0-9._-]+$/,
    "outputLabel may only contain letters, digits, '.', '_' and '-'"
  ),
  dbName: nonEmpty("dbName"),
  dbUser: nonEmpty("dbUser"),
  dbPassword: z.string(),
});

export const siteRegistrySchema = z.array(siteSpecSchema).superRefine((sites, ctx) => {
  const seen = new Map<string, number>();
  sites.forEach((site, index) => {
    const first = seen.get(site.outputLabel);
    if (first !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "outputLabel"],
        message: `duplicate outputLabel "${site.outputLabel}" (first used by entry ${first})`,
      });
    } else {
      seen.set(site.outputLabel, index);
    }
  });
});

export function formatIssues(err: ZodError): string[] {
  return err.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/** Validates a raw site list; malformed or duplicate entries fail the whole registry. */
export function parseSiteRegistry(raw: unknown): SiteSpec[] {
  const result = siteRegistrySchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid site registry: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
