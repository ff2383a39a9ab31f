/**
 * Public exports of the profile type engine.
 */

// Model
export type { FieldType, FieldValue, FieldMap } from '../schema/fieldTypes.js';
export { FIELD_TYPES } from '../schema/fieldTypes.js';
export type { FieldConstraint } from '../schema/constraints.js';
export type { FieldSpec, FieldSpecInput } from '../schema/fieldSpec.js';
export { defineField } from '../schema/fieldSpec.js';
export type { SupportStatus, SupportStatusEntry } from '../schema/supportStatus.js';
export { SUPPORT_STATUSES, supportStatusIndex } from '../schema/supportStatus.js';
export type { ProfileTypeSchema, ProfileTypeSchemaInput } from '../schema/profileTypeSchema.js';
export { defineProfileType, schemaKey } from '../schema/profileTypeSchema.js';
export type { ProfileSpec, ProfileSpecPatch } from '../schema/profileSpec.js';
export { compareSchemaVersions, compareReleases } from '../schema/versions.js';

// Errors
export * from '../errors/profileErrors.js';

// Registry
export { SchemaRegistry } from '../registry/schemaRegistry.js';
export { RegistryHolder } from '../registry/registryHolder.js';
export type { RegistryBuilder } from '../registry/registryHolder.js';
export type { SchemaLoader } from '../registry/loader.js';
export { StaticSchemaLoader, DirectorySchemaLoader, buildRegistry } from '../registry/loader.js';

// Operations
export type { ValidationOutcome } from '../validation/normalizer.js';
export { validateSpec, validatePatch } from '../validation/normalizer.js';
export type { FieldChange } from '../policy/updatePolicy.js';
export { authorizeUpdate, diffSpec } from '../policy/updatePolicy.js';
export type { ResolvedSupportStatus } from '../support/supportStatusResolver.js';
export { resolveSupportStatus } from '../support/supportStatusResolver.js';

// Facade
export type { EngineResult, ProfileTypeEngineOptions, RegistrySource, UnsupportedPolicy } from './profileTypeEngine.js';
export { ProfileTypeEngine } from './profileTypeEngine.js';
