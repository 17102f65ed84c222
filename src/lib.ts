/**
 * Library entry point: the pipeline components without the MCP server.
 */

export * from './types/key.js';
export * from './types/template.js';
export * from './types/texture.js';
export * from './types/publish.js';
export * from './types/config.js';

export * from './pipeline-errors.js';
export { Logger, LogLevel, logger, type LoggerOptions, type LoggerContext } from './logger.js';

export * from './algorithms/template-pattern.js';
export * from './algorithms/texture-filename.js';
export * from './algorithms/texture-set.js';
export * from './algorithms/export-preset.js';

export * from './classes/key-registry.js';
export * from './classes/template-engine.js';
export * from './classes/version-resolver.js';
export * from './classes/identity-lock.js';
export * from './classes/registry-client.js';
export * from './classes/export-trigger.js';
export * from './classes/publish-orchestrator.js';
export * from './classes/pipeline.js';

export { loadConfigFile, saveConfigFile } from './io/config-io.js';
export { scanExportArea, parseExportedFiles } from './io/export-scan.js';
export { findPathsFromTemplate, type TemplateMatch } from './io/template-scan.js';
export { generateThumbnail, DEFAULT_THUMBNAIL_SIZE, type ThumbnailOptions } from './io/thumbnail-io.js';
export { nodeFileSystem, withTimeout, type PublishFileSystem } from './io/publish-fs.js';
