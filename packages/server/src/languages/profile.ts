import * as path from "path";
import data from "./languages.json";

/** Names of the declarative query files each language may provide. */
export const QUERY_CATEGORIES = [
  "references",
  "bindings",
  "destructures",
  "assignments",
  "identifiers",
  "imports",
  "exports",
  "completion",
] as const;

export type QueryCategory = (typeof QUERY_CATEGORIES)[number];

/**
 * Everything the engine needs to know about one language, apart from the
 * compiled grammar and queries.
 */
export interface LanguageProfile {
  id: string;
  /** LSP language ids mapped onto this profile. */
  languageIds: string[];
  /** File extensions without the leading dot. */
  extensions: string[];
  grammar: { package: string; wasm: string };
  /** Directory under `queries/` holding the `.scm` files. */
  queryDir: string;
  /** Node types that open a lexical scope. */
  scopeNodes: string[];
  /** Expressions (whitespace removed) that denote the environment object. */
  envObjects: string[];
  quoteChars: string;
  completionTriggers: string[];
  /** Callees whose first string argument names a variable. */
  completionCallees: string[];
  commentNodes: string[];
  /** Extensions tried when resolving a relative module specifier. */
  moduleExtensions: string[];
  indexFiles: string[];
}

export const PROFILES: readonly LanguageProfile[] = data.profiles;

export function extensionOf(filePath: string): string {
  return path.extname(filePath).replace(/^\./, "").toLowerCase();
}

/** Collapse whitespace so `process . env` compares equal to `process.env`. */
export function normalizeExpression(text: string): string {
  return text.replace(/\s+/g, "");
}

export function isEnvObject(profile: LanguageProfile, text: string): boolean {
  return profile.envObjects.includes(normalizeExpression(text));
}

/** An env object, or a callee whose first argument names a variable. */
export function isEnvCompletionBase(profile: LanguageProfile, base: string): boolean {
  return isEnvObject(profile, base) || profile.completionCallees.includes(base);
}

export function stripQuotes(profile: LanguageProfile, text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && profile.quoteChars.includes(text[start])) start++;
  while (end > start && profile.quoteChars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}
