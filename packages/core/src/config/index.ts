export { parseJsonc, stripJsonComments } from './jsonc';
export { type LoadConfigOptions, loadConfig, parseConfigText } from './load';
export {
  configFromEnv,
  mergeConfig,
  type ResolveConfigOptions,
  resolveFeedConfig
} from './resolve';
export { applySubstitutions, type Env } from './substitution';
export {
  CONFIG_FILENAMES,
  type ConfigFormat,
  type FeedConfigInput,
  FeedConfigInputSchema,
  type LoadedConfig,
  type ResolvedFeedConfig
} from './types';
