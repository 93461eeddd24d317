import { extensionOf, PROFILES, type LanguageProfile } from "./profile";

/**
 * Maps LSP language ids and file extensions onto language profiles.
 * Stateless once constructed.
 */
export class LanguageRegistry {
  private readonly byLanguageId = new Map<string, LanguageProfile>();
  private readonly byExtension = new Map<string, LanguageProfile>();
  private readonly byId = new Map<string, LanguageProfile>();

  constructor(profiles: readonly LanguageProfile[] = PROFILES) {
    for (const profile of profiles) {
      this.register(profile);
    }
  }

  /** Later registrations win for shared ids and extensions. */
  register(profile: LanguageProfile): void {
    this.byId.set(profile.id, profile);
    for (const languageId of profile.languageIds) {
      this.byLanguageId.set(languageId, profile);
    }
    for (const ext of profile.extensions) {
      this.byExtension.set(ext.toLowerCase(), profile);
    }
  }

  get(id: string): LanguageProfile | undefined {
    return this.byId.get(id);
  }

  forLanguageId(languageId: string): LanguageProfile | undefined {
    return this.byLanguageId.get(languageId) ?? this.byId.get(languageId);
  }

  forPath(filePath: string): LanguageProfile | undefined {
    return this.byExtension.get(extensionOf(filePath));
  }

  /** Prefer the client's language id, then the file extension. */
  resolve(languageId: string | undefined, filePath: string): LanguageProfile | undefined {
    return (languageId ? this.forLanguageId(languageId) : undefined) ?? this.forPath(filePath);
  }

  all(): LanguageProfile[] {
    return [...this.byId.values()];
  }

  extensions(): string[] {
    return [...this.byExtension.keys()];
  }
}
