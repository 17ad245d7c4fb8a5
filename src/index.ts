export { fingerprint, normalizeSource, isFingerprint, shortFingerprint, type Fingerprint } from './utils/hash.js';
export { HashIndex, type HashIndexOptions, type IndexCounts } from './storage/database.js';
export {
  StalenessTracker,
  boundHistory,
  DEFAULT_HISTORY_LIMIT,
  type TrackerOptions,
  type TrackedEntity,
  type RecordOptions,
} from './staleness/tracker.js';
export { SidecarSynchronizer, type ReconcileResult, type SeedResult } from './sidecar/synchronizer.js';
export { projectFragment, parseFragments, commentPrefix, type SidecarFragment } from './sidecar/fragment.js';
export { ParserRegistry } from './parser/registry.js';
export type { SourceParserPlugin } from './parser/plugin.js';
export { createDefaultRegistry } from './parser/plugins/index.js';
export type { DescriptionGenerator, GenerateOptions, Provider } from './generator/generator.js';
export { createGenerator, registerGenerator } from './generator/registry.js';
export { MockDescriptionGenerator } from './generator/mock.js';
export { AnthropicDescriptionGenerator } from './generator/anthropic.js';
export { OpenAIDescriptionGenerator } from './generator/openai.js';
export { OllamaDescriptionGenerator } from './generator/ollama.js';
export { generateDescriptions, type GenerateRequest, type GenerateSummary } from './pipeline/generate.js';
export { discoverFiles } from './pipeline/discover.js';
export * from './config.js';
export * from './errors.js';
export type { EntityIdentity, ParsedEntity } from './model/entity.js';
export type { DescriptionRecord, CheckResult, FreshnessReport, StaleEntry, Freshness } from './model/record.js';
export { SCOPES, type Scope } from './model/scope.js';
