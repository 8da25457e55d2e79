import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import {
  ConfigError,
  FormatError,
  DependencyManifestSchema,
  type DependencyEntry,
  type DependencyManifest,
  type RootEntry,
  type Logger,
} from '@plugver/shared';
import {
  newPlugin,
  parsePlugin,
  type DependencyMap,
  type Plugin,
  type PluginResult,
} from '@plugver/plugins';

async function readManifestFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigError(`Cannot read manifest: ${filePath}`, { cause: error });
  }

  try {
    // JSON is valid YAML, so one parser covers both formats
    return yaml.load(content) ?? {};
  } catch (error: unknown) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigError(`Error parsing manifest: ${filePath}\n${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Read and schema-check a manifest file without creating any plugins.
 */
export async function readManifest(filePath: string): Promise<DependencyManifest> {
  const raw = await readManifestFile(filePath);
  const result = DependencyManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid manifest: ${filePath}\n${issues.join('\n')}`, {
      details: { path: filePath, issues },
    });
  }
  return result.data;
}

function unwrap(result: PluginResult, filePath: string, location: string): Plugin {
  if (!result.ok) {
    throw new FormatError(`${filePath} (${location}): ${result.error.message}`, {
      cause: result.error,
      details: result.error.details,
    });
  }
  return result.plugin;
}

function toRootResult(entry: RootEntry): PluginResult {
  const parsed = parsePlugin(entry.plugin);
  if (!parsed.ok || !entry.downloadURL) {
    return parsed;
  }
  return newPlugin(parsed.plugin.name, parsed.plugin.version, entry.downloadURL);
}

function toDependencyResult(entry: DependencyEntry): PluginResult {
  if (typeof entry === 'string') {
    return parsePlugin(entry);
  }
  return newPlugin(entry.name, entry.version, entry.downloadURL ?? '');
}

/**
 * Load a manifest file as one mapping of root plugin to required plugins.
 * A root listed twice with the same identity has its requirements merged.
 */
export async function loadManifest(filePath: string, logger: Logger): Promise<DependencyMap> {
  const manifest = await readManifest(filePath);
  const mapping = new Map<Plugin, Plugin[]>();

  manifest.roots.forEach((entry, i) => {
    const root = unwrap(toRootResult(entry), filePath, `roots.${i}`);
    const requires = entry.requires.map((dep, j) =>
      unwrap(toDependencyResult(dep), filePath, `roots.${i}.requires.${j}`),
    );

    const existing = [...mapping.keys()].find((candidate) => candidate.equals(root));
    if (existing) {
      logger.warn(`Root ${root.toString()} is listed more than once; merging its requirements`);
      mapping.set(existing, [...(mapping.get(existing) ?? []), ...requires]);
    } else {
      mapping.set(root, requires);
    }
  });

  logger.debug(`Loaded ${mapping.size} root plugin(s)`);
  return mapping;
}
