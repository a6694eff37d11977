/**
 * model-conventions: a convention-driven metadata model builder
 *
 * Decorated classes describe entities; an ordered set of conventions reacts
 * to every change the builders make and fills in what the decorators leave
 * open (properties, keys, relationships, value generation, service members).
 *
 * Core concepts:
 * - Decorators: @Entity, @Column, @Navigation and friends record metadata
 * - Conventions: react to builder events and configure the model
 * - ModelBuilder: Orchestrator that builds and finalizes the model
 *
 * @example
 * ```typescript
 * import { Entity, Column, Navigation, ModelBuilder, type Related } from 'model-conventions'
 *
 * // 1. Define entities
 * @Entity('blogs')
 * class Blog {
 *   @Column()
 *   id!: number
 *
 *   @Navigation(() => Post, { collection: true })
 *   posts!: Related<Post>[]
 * }
 *
 * @Entity('posts')
 * class Post {
 *   @Column()
 *   id!: number
 *
 *   @Navigation(() => Blog)
 *   blog!: Related<Blog>
 * }
 *
 * // 2. Build the model
 * const model = new ModelBuilder({ entities: [Blog, Post] }).build()
 *
 * // 3. Inspect it
 * model.findEntityType(Post)?.findProperty('blogId') // shadow foreign key
 * ```
 */

// Decorators: Define entity metadata
export {
  Entity,
  Column,
  Member,
  Key,
  ForeignKey,
  InverseProperty,
  Navigation,
  NotMapped,
  DatabaseGenerated,
  Owned,
  Keyless,
  Container,
} from './decorators';

// ModelBuilder: Primary orchestrator
export { ModelBuilder } from './model-builder';

// Config: Type-safe configuration and environment helpers
export { defineConfig, env, resolveLogLevel } from './config';

// Metadata: the model graph and its builders
export { ConfigurationSource, overrides, overridesStrictly } from './metadata/configuration-source';
export { Model } from './metadata/model';
export { EntityType } from './metadata/entity-type';
export { Property } from './metadata/property';
export { Key as KeyMetadata } from './metadata/key';
export { ForeignKey as ForeignKeyMetadata } from './metadata/foreign-key';
export { Navigation as NavigationMetadata } from './metadata/navigation';
export { ServiceProperty } from './metadata/service-property';
export { InternalModelBuilder } from './metadata/internal-model-builder';
export { InternalEntityTypeBuilder } from './metadata/internal-entity-type-builder';
export { InternalPropertyBuilder } from './metadata/internal-property-builder';
export { InternalRelationshipBuilder } from './metadata/internal-relationship-builder';

// Conventions: the pipeline and the stock conventions
export { ConventionDispatcher, DEFAULT_MAX_CONVENTION_DEPTH } from './conventions/convention-dispatcher';
export { ConventionContext } from './conventions/convention-context';
export {
  ConventionSet,
  createCoreConventionSet,
  createDocumentStoreConventionSet,
} from './conventions/convention-set';
export { ForeignKeyAttributeConvention } from './conventions/foreign-key-attribute-convention';
export { InversePropertyAttributeConvention } from './conventions/inverse-property-attribute-convention';
export { ServicePropertyDiscoveryConvention } from './conventions/service-property-discovery-convention';
export { ValueGeneratorConvention } from './conventions/value-generator-convention';
export { ModelCleanupConvention } from './conventions/model-cleanup-convention';
export { StoreKeyConvention } from './conventions/store-key-convention';

// Collaborators: reflection, diagnostics, service bindings
export { DecoratorTypeInspector } from './reflection';
export type { TypeInspector } from './reflection';
export { ModelEventId, PinoModelDiagnostics, RecordingDiagnostics } from './diagnostics';
export type { ModelDiagnostic, ModelDiagnostics } from './diagnostics';
export {
  ServiceParameterBindingFactory,
  ServiceParameterBindingFactories,
} from './parameter-binding';
export type { ParameterBindingFactory, ServiceParameterBinding } from './parameter-binding';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';

// Errors
export { ModelError, ModelConfigurationError, ModelStateError, ModelErrorCode } from './errors';

// Types: Re-export commonly used types
export type {
  ModelBuilderOptions,
  ConventionSetFactory,
  MemberInfo,
  Related,
  ColumnType,
  ValueGenerated,
} from './types';
export type {
  Convention,
  ConventionEventKind,
  ConventionFor,
} from './conventions/convention-events';

export { AnnotationNames } from './types';
