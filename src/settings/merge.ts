import { ConfigParseError } from '../core/errors.js';
import type { ColorScheme } from './schemes.js';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ProfileSelector = (profile: JsonObject) => boolean;

/** Profile field that names the active color scheme. */
export const ACTIVE_SCHEME_FIELD = 'colorScheme';

/**
 * Deepest nesting a settings document may have. Deeper documents are
 * rejected rather than partially written back.
 */
export const MAX_DOCUMENT_DEPTH = 64;

const SELECTOR_FIELDS = ['source', 'commandline', 'name'] as const;

export interface MergeOutcome {
  document: JsonObject;
  schemeAdded: boolean;
  /** Display names (or indexes) of profiles whose scheme was changed. */
  profilesUpdated: string[];
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Select profiles whose `source`, `commandline` or `name` contains the
 * marker. Case-sensitive.
 */
export function createProfileSelector(marker: string): ProfileSelector {
  return (profile) =>
    SELECTOR_FIELDS.some((field) => {
      const value = profile[field];
      return typeof value === 'string' && value.includes(marker);
    });
}

/**
 * Nesting depth of a JSON value; scalars are depth 0. Throws once `limit`
 * is exceeded instead of walking the rest of the tree.
 */
export function measureDepth(value: JsonValue, limit = MAX_DOCUMENT_DEPTH, source = '<document>'): number {
  const walk = (node: JsonValue, depth: number): number => {
    if (node === null || typeof node !== 'object') return depth;
    if (depth + 1 > limit) {
      throw new ConfigParseError(source, `Settings nest deeper than ${limit} levels`);
    }
    const children = Array.isArray(node) ? node : Object.values(node);
    let deepest = depth + 1;
    for (const child of children) {
      deepest = Math.max(deepest, walk(child, depth + 1));
    }
    return deepest;
  };
  return walk(value, 0);
}

function schemeEntry(scheme: ColorScheme): JsonObject {
  const entry: JsonObject = {};
  for (const [key, value] of Object.entries(scheme)) {
    if (typeof value === 'string') entry[key] = value;
  }
  return entry;
}

/**
 * The profile list: `profiles.list`, or `profiles` itself in the legacy
 * layout where it was a bare array.
 */
function profileList(document: JsonObject): JsonValue[] | null {
  const profiles = document.profiles;
  if (Array.isArray(profiles)) return profiles;
  if (isJsonObject(profiles) && Array.isArray(profiles.list)) return profiles.list;
  return null;
}

/**
 * Add `scheme` to the document's `schemes` unless one with the same name is
 * already there, and point every selected profile at it.
 *
 * An existing scheme with the same name is left as it is, even when its
 * colors differ from `scheme`.
 */
export function applyColorScheme(
  document: JsonObject,
  scheme: ColorScheme,
  selector: ProfileSelector,
  source = '<document>',
): MergeOutcome {
  measureDepth(document, MAX_DOCUMENT_DEPTH, source);
  const next = structuredClone(document);

  if (next.schemes === undefined) {
    next.schemes = [];
  }
  const schemes = next.schemes;
  if (!Array.isArray(schemes)) {
    throw new ConfigParseError(source, '"schemes" must be an array');
  }

  const exists = schemes.some((entry) => isJsonObject(entry) && entry.name === scheme.name);
  if (!exists) {
    schemes.push(schemeEntry(scheme));
  }

  const profilesUpdated: string[] = [];
  const list = profileList(next) ?? [];
  list.forEach((profile, index) => {
    if (!isJsonObject(profile) || !selector(profile)) return;
    if (profile[ACTIVE_SCHEME_FIELD] === scheme.name) return;
    profile[ACTIVE_SCHEME_FIELD] = scheme.name;
    profilesUpdated.push(typeof profile.name === 'string' ? profile.name : `#${index}`);
  });

  return { document: next, schemeAdded: !exists, profilesUpdated };
}

export function mergeColorScheme(
  document: JsonObject,
  scheme: ColorScheme,
  selector: ProfileSelector,
): JsonObject {
  return applyColorScheme(document, scheme, selector).document;
}
