import { z } from "zod";
import yaml from "js-yaml";

// =============================================================================
// Profile documents
// =============================================================================

/**
 * Sections in a profile document may be omitted or left empty (`blocklists:`
 * with no items parses as null). Both mean "zero items".
 */
function section<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((items): z.output<T>[] => items ?? []);
}

/**
 * A scalar left blank in YAML (`url:`) parses as null. Blank fields take
 * their default so only the affected item is skipped, never the profile.
 */
function blankable<T extends z.ZodTypeAny>(field: T, fallback: z.output<T>) {
  return field.nullish().transform((value): z.output<T> => value ?? fallback);
}

export const BlocklistEntrySchema = z.object({
  name: blankable(z.string(), "unnamed"),
  /** Entries without a URL are recorded as skipped. */
  url: blankable(z.string(), ""),
  description: blankable(z.string(), ""),
  enabled: blankable(z.boolean(), true),
});
export type BlocklistEntry = z.infer<typeof BlocklistEntrySchema>;

export const WhitelistCategorySchema = z.object({
  name: blankable(z.string(), "unnamed"),
  reason: blankable(z.string(), ""),
  /** Applied in order; duplicates are applied independently. Blank domains are skipped. */
  domains: section(blankable(z.string(), "")),
});
export type WhitelistCategory = z.infer<typeof WhitelistCategorySchema>;

export const RegexRuleSchema = z.object({
  description: blankable(z.string(), ""),
  pattern: blankable(z.string(), ""),
  enabled: blankable(z.boolean(), true),
});
export type RegexRule = z.infer<typeof RegexRuleSchema>;

export const ProfileSpecSchema = z
  .object({
    name: z.string().min(1, "Profile name is required"),
    description: blankable(z.string(), ""),
    category: blankable(z.string(), "custom"),
    warnings: section(z.string()),
    blocklists: section(BlocklistEntrySchema),
    whitelist: section(WhitelistCategorySchema),
    regexPatterns: section(RegexRuleSchema),
    // YAML profiles spell the regex section in snake_case
    regex_patterns: section(RegexRuleSchema),
  })
  .transform(({ regex_patterns, regexPatterns, ...rest }) => ({
    ...rest,
    regexPatterns: regexPatterns.length > 0 ? regexPatterns : regex_patterns,
  }));

export type ProfileSpec = Readonly<z.infer<typeof ProfileSpecSchema>>;

// =============================================================================
// Errors
// =============================================================================

/** Base class for every failure of the Load stage. */
export class ProfileLoadError extends Error {
  constructor(
    message: string,
    readonly profileId: string,
  ) {
    super(message);
    this.name = "ProfileLoadError";
  }
}

export class ProfileNotFoundError extends ProfileLoadError {
  constructor(profileId: string, readonly available: string[] = []) {
    super(`Profile not found: ${profileId}`, profileId);
    this.name = "ProfileNotFoundError";
  }
}

export class ProfileValidationError extends ProfileLoadError {
  constructor(profileId: string, readonly issues: string[]) {
    super(`Invalid profile ${profileId}: ${issues.join("; ")}`, profileId);
    this.name = "ProfileValidationError";
  }
}

// =============================================================================
// Parsing
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate an already-decoded profile object. The returned profile is deeply
 * frozen: a run never mutates the profile it loaded.
 */
export function validateProfile(raw: unknown, profileId = "inline"): ProfileSpec {
  const result = ProfileSpecSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ProfileValidationError(profileId, issues);
  }
  return deepFreeze(result.data);
}

/**
 * Decode and validate a YAML (or JSON) profile document.
 */
export function parseProfileDocument(text: string, profileId = "inline"): ProfileSpec {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ProfileValidationError(profileId, [`Invalid YAML: ${message}`]);
  }

  if (raw === null || raw === undefined || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ProfileValidationError(profileId, ["Profile document must be a mapping"]);
  }

  return validateProfile(raw, profileId);
}

/** Items that the pipeline will attempt, per stage. */
export function countEnabledItems(profile: ProfileSpec): {
  blocklists: number;
  whitelist: number;
  regexPatterns: number;
} {
  return {
    blocklists: profile.blocklists.filter((b) => b.enabled && b.url !== "").length,
    whitelist: profile.whitelist.reduce((sum, c) => sum + c.domains.filter((d) => d !== "").length, 0),
    regexPatterns: profile.regexPatterns.filter((r) => r.enabled && r.pattern !== "").length,
  };
}
