/**
 * Plugin identity
 *
 * A named, versioned artifact with an optional download URL. Values are
 * validated when created and never change afterwards.
 */

import { FormatError } from '@plugver/shared';

/** Plugin names: letters, digits, `_` and `-`. */
export const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Plugin versions: letters, digits, `_`, `+`, `.` and `-`. */
export const VERSION_PATTERN = /^[A-Za-z0-9_+.-]+$/;

/** Download URLs. Matched anywhere in the string, not anchored. */
export const DOWNLOAD_URL_PATTERN =
  /https?:\/\/(www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b([-a-zA-Z0-9()@:%_+.~#?&\/=]*)/;

/**
 * Serialised form of a plugin.
 */
export interface PluginJSON {
  name: string;
  version: string;
  downloadURL: string;
}

const validated: unique symbol = Symbol('validated');

export class Plugin {
  /**
   * Only reachable through {@link newPlugin} and {@link parsePlugin}, which
   * validate the fields first.
   */
  constructor(
    _token: typeof validated,
    public readonly name: string,
    public readonly version: string,
    public readonly downloadURL: string,
  ) {
    if (_token !== validated) {
      throw new TypeError('Plugin values are created with newPlugin or parsePlugin');
    }
    Object.freeze(this);
  }

  equals(other: Plugin): boolean {
    return (
      this.name === other.name &&
      this.version === other.version &&
      this.downloadURL === other.downloadURL
    );
  }

  toString(): string {
    return `${this.name}:${this.version}`;
  }

  toJSON(): PluginJSON {
    return { name: this.name, version: this.version, downloadURL: this.downloadURL };
  }
}

/**
 * Outcome of creating a plugin. Creation never throws.
 */
export type PluginResult = { ok: true; plugin: Plugin } | { ok: false; error: FormatError };

function validatePlugin(name: string, version: string, downloadURL: string): FormatError | null {
  if (!NAME_PATTERN.test(name)) {
    return new FormatError(
      `invalid plugin name '${name}:${version}', must follow pattern '${NAME_PATTERN.source}'`,
      { details: { value: name, pattern: NAME_PATTERN.source } },
    );
  }
  if (!VERSION_PATTERN.test(version)) {
    return new FormatError(
      `invalid plugin version '${name}:${version}', must follow pattern '${VERSION_PATTERN.source}'`,
      { details: { value: version, pattern: VERSION_PATTERN.source } },
    );
  }
  if (downloadURL.length > 0 && !DOWNLOAD_URL_PATTERN.test(downloadURL)) {
    return new FormatError(
      `invalid download URL '${downloadURL}' for plugin name ${name}:${version}, must follow pattern '${DOWNLOAD_URL_PATTERN.source}'`,
      { details: { value: downloadURL, pattern: DOWNLOAD_URL_PATTERN.source } },
    );
  }
  return null;
}

/**
 * Create a plugin from discrete fields. Checks name, then version, then the
 * download URL (only when non-empty) and stops at the first failure.
 */
export function newPlugin(name: string, version: string, downloadURL = ''): PluginResult {
  const error = validatePlugin(name, version, downloadURL);
  if (error) {
    return { ok: false, error };
  }
  return { ok: true, plugin: new Plugin(validated, name, version, downloadURL) };
}

/**
 * Create a plugin from a string such as `"workflow-job:2.33"`.
 * Everything after the first colon is the version.
 */
export function parsePlugin(nameWithVersion: string): PluginResult {
  const separator = nameWithVersion.indexOf(':');
  if (separator === -1) {
    return {
      ok: false,
      error: new FormatError(`invalid plugin format '${nameWithVersion}'`, {
        details: { value: nameWithVersion },
      }),
    };
  }
  return newPlugin(
    nameWithVersion.slice(0, separator),
    nameWithVersion.slice(separator + 1),
  );
}

/**
 * Unwrap a result created from trusted input, such as a static table or a
 * test fixture. Throws the FormatError otherwise; it is not meant to be
 * caught, so never pass user-supplied values here.
 */
export function mustPlugin(result: PluginResult): Plugin {
  if (!result.ok) {
    throw result.error;
  }
  return result.plugin;
}
