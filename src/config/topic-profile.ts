/**
 * Topic profile: the subject debates are classified against and its lexicon
 *
 * The bundled profile targets Brexit. TOPIC_PROFILE_PATH points at a JSON file
 * with the same shape to classify against another subject.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { TopicProfile } from "../lib/model";
import bundledProfile from "./topic-profile.json";
import { ConfigError } from "../lib/errors";

const termList = z
  .array(z.string().trim().min(1))
  .min(1)
  .transform((terms) => terms.map((term) => term.toLowerCase()));

export const TopicProfileSchema = z
  .object({
    subject: z.string().trim().min(1),
    description: z.string().trim().min(1),
    considerations: z.array(z.string()).default([]),
    primaryTerms: termList,
    secondaryTerms: termList,
  })
  .superRefine((profile, ctx) => {
    const primary = new Set(profile.primaryTerms);
    const overlap = profile.secondaryTerms.filter((term) => primary.has(term));
    if (overlap.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["secondaryTerms"],
        message: `Terms listed as both primary and secondary: ${overlap.join(", ")}`,
      });
    }
  });

/**
 * Validate a raw profile object
 */
export function parseTopicProfile(raw: unknown, source: string): TopicProfile {
  const result = TopicProfileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid topic profile in ${source}`,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load the topic profile, from `profilePath` when given, else the bundled one
 */
export function loadTopicProfile(profilePath?: string): TopicProfile {
  if (!profilePath) {
    return parseTopicProfile(bundledProfile, "bundled topic-profile.json");
  }

  const resolved = path.resolve(process.cwd(), profilePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read topic profile at ${resolved}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseTopicProfile(raw, resolved);
}
