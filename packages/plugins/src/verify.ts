import type { Plugin } from './plugin';

/**
 * Root plugin mapped to the plugins it requires.
 */
export type DependencyMap = ReadonlyMap<Plugin, readonly Plugin[]>;

/**
 * One "plugin X is required at version V" fact, attributed to the root that declared it.
 */
interface RequirementRecord {
  version: string;
  /** `name:version` of the declaring root */
  origin: string;
}

/**
 * Check that every plugin is required at a single version across all mappings.
 *
 * Each root is also recorded as a requirement on its own name, so a root that
 * appears elsewhere as a dependency (or as a root at another version) is
 * checked too. Every ordered pair of records with differing versions yields one
 * message, so a conflict between A and B is reported as (A, B) and (B, A).
 *
 * Messages follow insertion order but callers should treat them as unordered;
 * see {@link sortMessages}. Returns an empty list when there are no conflicts.
 */
export function verifyDependencies(...mappings: DependencyMap[]): string[] {
  const messages: string[] = [];
  const requirements = new Map<string, RequirementRecord[]>();

  const record = (name: string, version: string, origin: string) => {
    const records = requirements.get(name);
    if (records) {
      records.push({ version, origin });
    } else {
      requirements.set(name, [{ version, origin }]);
    }
  };

  for (const mapping of mappings) {
    for (const [root, plugins] of mapping) {
      const origin = root.toString();
      record(root.name, root.version, origin);
      for (const plugin of plugins) {
        record(plugin.name, plugin.version, origin);
      }
    }
  }

  for (const [pluginName, records] of requirements) {
    if (records.length === 1) {
      continue;
    }

    for (const first of records) {
      for (const second of records) {
        if (first.version !== second.version) {
          messages.push(
            `Plugin '${first.origin}' requires version '${first.version}' but plugin '${second.origin}' requires '${second.version}' for plugin '${pluginName}'`,
          );
        }
      }
    }
  }

  return messages;
}

/**
 * Lexicographically sorted copy, for reproducible output.
 */
export function sortMessages(messages: readonly string[]): string[] {
  return [...messages].sort();
}
