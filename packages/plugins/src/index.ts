/**
 * @plugver/plugins
 *
 * Plugin identity and dependency version-conflict verification.
 */

export {
  Plugin,
  newPlugin,
  parsePlugin,
  mustPlugin,
  NAME_PATTERN,
  VERSION_PATTERN,
  DOWNLOAD_URL_PATTERN,
  type PluginJSON,
  type PluginResult,
} from './plugin';

export { verifyDependencies, sortMessages, type DependencyMap } from './verify';

// Re-export the error type callers receive from failed results
export { FormatError } from '@plugver/shared';
