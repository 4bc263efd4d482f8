export {
  createMemoryModelRegistry,
  MemoryModelRegistry,
  type MemoryModelRegistryDeps,
} from "./adapters/memory/memory-model-registry"
export { defineModel, type FieldOptions, type FieldSpec } from "./core/define-model"
export { createEntity, Entity, isEntity } from "./core/entity"
export { fieldTypes, isUuid, type Uuid } from "./core/field-types"
export { IDENTIFIER_PATTERN, isIdentifier } from "./core/identifier"
export { type FieldType, type LogicalType, logicalTypes, type WireValue } from "./ports/field-type"
export type { FieldDefinition, ModelSchema } from "./ports/model"
export type { ModelRegistry } from "./ports/model-registry"
