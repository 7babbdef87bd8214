import { copyFileSync, existsSync, lstatSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { ConfigParseError } from '../core/errors.js';
import { applyColorScheme, measureDepth, type JsonObject, type ProfileSelector } from './merge.js';
import type { ColorScheme } from './schemes.js';

export type ApplyResult =
  | { kind: 'missing'; path: string }
  | { kind: 'unchanged'; path: string; backupPath: string }
  | {
      kind: 'updated';
      path: string;
      backupPath: string;
      schemeAdded: boolean;
      profilesUpdated: string[];
    };

export interface SettingsFileOptions {
  now?: () => Date;
}

// JSON.parse yields only JSON values, so an object here is a JsonObject.
function isDocument(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function backupPathFor(path: string, at: Date): string {
  return `${path}.backup.${at.toISOString().replace(/[:.]/g, '-')}`;
}

/**
 * Parse a settings document. A leading byte-order mark is ignored.
 */
export function parseSettings(raw: string, path: string): JsonObject {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigParseError(path, `Malformed JSON in ${path}`, { cause: err });
  }
  if (!isDocument(parsed)) {
    throw new ConfigParseError(path, `Expected a JSON object at the top of ${path}`);
  }
  measureDepth(parsed, undefined, path);
  return parsed;
}

export function readSettings(path: string): JsonObject {
  return parseSettings(readFileSync(path, 'utf-8'), path);
}

export function serializeSettings(document: JsonObject): string {
  return JSON.stringify(document, null, 4) + '\n';
}

/**
 * Replace `path` with `document` by writing a sibling file and renaming it
 * over the original. On failure the sibling file is removed, the original
 * is left in place and the write error is rethrown.
 */
export function writeSettingsAtomic(path: string, document: JsonObject): void {
  const tempPath = `${path}.tmp-${process.pid}`;
  try {
    writeFileSync(tempPath, serializeSettings(document), 'utf-8');
    renameSync(tempPath, path);
  } catch (err) {
    // Only a file we wrote is ours to remove; anything else at the path stays.
    if (lstatSync(tempPath, { throwIfNoEntry: false })?.isFile()) {
      try {
        rmSync(tempPath);
      } catch {
        throw new Error(`Could not write ${path}; left ${tempPath} behind`, { cause: err });
      }
    }
    throw err;
  }
}

/**
 * Whether the scheme is present and every selected profile already uses it.
 * A missing file counts as not applied.
 */
export function isColorSchemeApplied(path: string, scheme: ColorScheme, selector: ProfileSelector): boolean {
  if (!existsSync(path)) return false;
  const outcome = applyColorScheme(readSettings(path), scheme, selector, path);
  return !outcome.schemeAdded && outcome.profilesUpdated.length === 0;
}

/**
 * Merge `scheme` into the settings file at `path`.
 *
 * The current file is copied to `<path>.backup.<timestamp>` before it is
 * parsed; a parse error leaves the original untouched.
 */
export function applyColorSchemeToFile(
  path: string,
  scheme: ColorScheme,
  selector: ProfileSelector,
  options: SettingsFileOptions = {},
): ApplyResult {
  if (!existsSync(path)) {
    return { kind: 'missing', path };
  }

  const now = options.now ?? (() => new Date());
  const backupPath = backupPathFor(path, now());
  copyFileSync(path, backupPath);

  const outcome = applyColorScheme(readSettings(path), scheme, selector, path);
  if (!outcome.schemeAdded && outcome.profilesUpdated.length === 0) {
    return { kind: 'unchanged', path, backupPath };
  }

  writeSettingsAtomic(path, outcome.document);
  return {
    kind: 'updated',
    path,
    backupPath,
    schemeAdded: outcome.schemeAdded,
    profilesUpdated: outcome.profilesUpdated,
  };
}
