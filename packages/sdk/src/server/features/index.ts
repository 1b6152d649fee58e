/**
 * Server Features Index
 *
 * Re-exports all server features.
 */

export { LOGGING_LEVELS, handleSetLevel, isLevelEnabled, severityOf } from "./logging";
export { handlePing } from "./ping";
export { ToolsFeature } from "./tools";
export { PromptsFeature } from "./prompts";
export { ResourcesFeature, type TemplateMatch } from "./resources";
