import * as path from "path";
import { readFile, readdir } from "node:fs/promises";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { parseProfileDocument, ProfileLoadError, ProfileNotFoundError } from "@dnsha/core";
import type { ProfileSpec } from "@dnsha/core";
import { DNSHA_SETTINGS } from "../config/dns-ha.config";
import type { DnsHaSettings } from "../config/dns-ha.config";

const PROFILE_EXTENSIONS = [".yml", ".yaml"];
const PROFILE_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;

/**
 * The errno code of a failed fs call. Checked by shape: under test sandboxes
 * fs errors come from another realm and fail `instanceof Error`.
 */
export function errnoCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}

/**
 * Source of profiles for the Load stage.
 */
export interface IProfileSource {
  load(profileId: string): Promise<ProfileSpec>;
}

/**
 * ProfileLoaderService: resolves profile ids to `<id>.yml` / `<id>.yaml`
 * files under PROFILES_DIR and parses them.
 */
@Injectable()
export class ProfileLoaderService implements IProfileSource {
  private readonly logger = new Logger(ProfileLoaderService.name);

  constructor(@Inject(DNSHA_SETTINGS) private readonly settings: DnsHaSettings) {}

  get profilesDir(): string {
    return path.resolve(this.settings.profilesDir);
  }

  /**
   * Ids of every profile document in the profiles directory, sorted.
   */
  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.profilesDir);
    } catch (err) {
      this.logger.warn(`Cannot read profiles directory ${this.profilesDir}: ${errnoCode(err) ?? String(err)}`);
      return [];
    }

    const ids = files
      .filter((f) => PROFILE_EXTENSIONS.includes(path.extname(f)))
      .map((f) => path.basename(f, path.extname(f)));
    return Array.from(new Set(ids)).sort();
  }

  /**
   * Read and validate a profile.
   *
   * @throws ProfileNotFoundError if no document exists for the id
   * @throws ProfileValidationError if the document is malformed
   */
  async load(profileId: string): Promise<ProfileSpec> {
    const text = await this.read(profileId);
    const profile = parseProfileDocument(text, profileId);

    this.logger.log(`Loaded profile ${profile.name} (${profile.category}): ${profile.description || "no description"}`);
    for (const warning of profile.warnings) {
      this.logger.warn(`Profile ${profile.name}: ${warning}`);
    }
    return profile;
  }

  private async read(profileId: string): Promise<string> {
    // Ids never carry path separators; this also keeps lookups inside profilesDir.
    if (PROFILE_ID_PATTERN.test(profileId)) {
      for (const ext of PROFILE_EXTENSIONS) {
        try {
          return await readFile(path.join(this.profilesDir, `${profileId}${ext}`), "utf8");
        } catch (err) {
          if (errnoCode(err) !== "ENOENT") {
            const message = err instanceof Error ? err.message : String(err);
            throw new ProfileLoadError(`Cannot read profile ${profileId}: ${message}`, profileId);
          }
        }
      }
    }

    throw new ProfileNotFoundError(profileId, await this.list());
  }
}
