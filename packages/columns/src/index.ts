export {
  type CompositeKeyCodecDeps,
  CompositeKeyCodec,
} from "./core/composite/composite-key-codec"
export {
  CompositeKeyValidator,
  type CompositeKeyValidatorDeps,
} from "./core/composite/composite-key-validator"
export { SchemaResolver, type SchemaResolverDeps } from "./core/composite/schema-resolver"
export {
  decodeComponent,
  encodeComponent,
  KEY_COMPONENT_TYPES,
} from "./core/composite/value-normalizer"
export { identifierKey } from "./core/map/identifier-key"
export { MapColumn, type MapColumnOptions } from "./core/map/map-column"
export {
  CompositeReferenceColumn,
  type CompositeReferenceColumnDeps,
} from "./core/reference/composite-reference-column"
export {
  createRelationColumns,
  type RelationColumns,
  type RelationColumnsDeps,
} from "./core/reference/create-relation-columns"
export {
  UuidReferenceColumn,
  type UuidReferenceColumnDeps,
  type UuidReferenceVariant,
} from "./core/reference/uuid-reference-column"
export { type CreateKeymapOptions, createKeymap, type Keymap } from "./create-keymap"
export type {
  CompositeKeyValue,
  FlatStorageMapping,
  KeyInput,
  StoredMapping,
} from "./ports/mapping"
export type {
  CompositeReference,
  ReferenceColumn,
  ReferenceVariant,
  SimpleReference,
  StringCoercedReference,
} from "./ports/reference-column"
export {
  parseReferenceOptions,
  type ReferenceConfig,
  type ReferenceOptions,
  referenceOptionsSchema,
} from "./ports/reference-options"
export {
  type LoadSettingsOptions,
  loadKeymapSettings,
  mapEnvToSettings,
  SETTINGS_PREFIX,
} from "./settings/load-settings"
export { type KeymapSettings, type SettingsEnv, settingsEnvSchema } from "./settings/schema"
