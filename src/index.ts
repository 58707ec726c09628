export { resolveHostConfig, LOAD_FAILURE_MODES, type HostConfig, type LoadFailureMode } from "./config/hostConfig.js";
export {
  ConfigurationError,
  DefinitionError,
  describeError,
  ENTITY_ERROR_TAXONOMY,
  EntityError,
  LoadFailureError,
  PayloadValidationError,
  type EntityErrorCategory,
} from "./errors.js";
export { compileBlueprint, createBlueprint, toGraphNode, type BlueprintValues } from "./entities/blueprint.js";
export {
  DEFAULT_EDGE_LABEL,
  DEFAULT_ENTITY_COLOR,
  DEFAULT_ENTITY_ICON,
  DEFAULT_TRANSFORM_ICON,
  defineEntity,
  defineTransform,
  parseEntityDefinition,
  type EntityDefinition,
  type TransformDefinitionInput,
} from "./entities/define.js";
export {
  dispatch,
  EntityInstance,
  TransformDispatcher,
  type TransformDispatcherOptions,
  type TransformLabel,
} from "./entities/dispatcher.js";
export * from "./entities/elements.js";
export { mapToInputRecord, mapToTransformInput, type GraphNodeLike } from "./entities/inputMapper.js";
export {
  EntityLoader,
  MANIFEST_EXTENSIONS,
  MODULE_EXTENSIONS,
  type EntityLoaderOptions,
  type LoadFailure,
  type LoadReport,
} from "./entities/loader.js";
export { compileManifest, parseManifest, type HandlerCatalog, type ManifestEntity } from "./entities/manifest.js";
export {
  EntityRegistry,
  entityRegistry,
  initEntityRegistry,
  resetEntityRegistry,
  summarizeDescriptor,
  type RegistrySnapshot,
} from "./entities/registry.js";
export { renderManifestTemplate, templateHandlerName, type ManifestTemplateOptions } from "./entities/template.js";
export { TransformInput } from "./entities/transformInput.js";
export type * from "./entities/types.js";
export { isLayoutRow } from "./entities/types.js";
export { GraphNodeSchema, parseGraphNode } from "./entities/wire.js";
export {
  createEntityHost,
  EntityHost,
  type CreateEntityHostOptions,
  type EntityHostOptions,
  type EntityListing,
  type EntitySourceView,
} from "./host.js";
export { getDispatchContext, type DispatchContext } from "./infra/dispatchContext.js";
export { StructuredLogger, type LogEntry, type LoggerOptions } from "./logger.js";
export { throwIfAborted, TransformAbortedError, unavailableDriverFactory, withDriver } from "./runtime/driver.js";
export { labelsMatch, normalizeLabel, toCamelCase } from "./utils/labels.js";
