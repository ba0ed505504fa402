export * from "./lib/backups/restore.js";
export * from "./lib/backups/session.js";
export * from "./lib/canonical-paths.js";
export * from "./lib/clean/discover.js";
export * from "./lib/clean/run.js";
export * from "./lib/consumers/registry.js";
export * from "./lib/decisions.js";
export * from "./lib/dedup/deduplicate.js";
export * from "./lib/dedup/similarity.js";
export * from "./lib/engine-context.js";
export * from "./lib/errors.js";
export * from "./lib/file-writer.js";
export * from "./lib/frontmatter.js";
export * from "./lib/generated-marker.js";
export * from "./lib/generators/index.js";
export * from "./lib/importers/index.js";
export * from "./lib/logger.js";
export * from "./lib/manifest/settable-keys.js";
export * from "./lib/manifest/store.js";
export * from "./lib/manifest/types.js";
export * from "./lib/manifest/validate.js";
export * from "./lib/operations/init.js";
export * from "./lib/operations/reconfigure.js";
export * from "./lib/operations/rules.js";
export * from "./lib/operations/settings.js";
export * from "./lib/operations/status.js";
export * from "./lib/rules/store.js";
export * from "./lib/skills/import.js";
export * from "./lib/skills/reconcile.js";
export * from "./lib/sync/run.js";
export * from "./lib/sync-results.js";
