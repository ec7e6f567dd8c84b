export type {
  AssetBundle,
  JsonScalar,
  MarkupElement,
  MountPointOptions,
  OutputMessage,
  OutputRenderer,
  OutputState,
  Producer,
  SerializedPayload
} from './types';

export { serializeTable, typeHintOf, toJsonScalar, TYPE_HINTS } from './table/serialize';
export type { TypeHint } from './table/serialize';

export {
  tabulatorBundle,
  outputTabulator,
  tableOutput,
  TableOutput,
  DEFAULT_HEIGHT
} from './output/tabulator';
export type { TableRenderer } from './output/tabulator';
export {
  OUTPUT_MESSAGE_EVENT,
  TABULATOR_OUTPUT_CLASS,
  TABULATOR_ERROR_CLASS
} from './output/constants';

export {
  resolveId,
  rootScope,
  withNamespace,
  Scope,
  NAMESPACE_SEPARATOR
} from './markup/scope';
export {
  attachDependency,
  bundleFiles,
  bundleHref,
  bundleKey,
  defineAssetBundle,
  dependenciesOf
} from './markup/dependencies';

export { rehypeHtmlDependencies, collectDependencies, dependencyTags } from './plugin';
export type { DependencyOptions } from './plugin';
export { page, assemblePage } from './page';
export type { PageOptions } from './page';

export { OutputSession } from './session/session';
export type { OutputListener, SessionOptions } from './session/session';

export {
  serializedPayloadSchema,
  outputMessageSchema,
  outputErrorSchema,
  jsonScalarSchema
} from './schemas/payload';

export * from './errors';
export type { Logger } from './logger';
