/**
 * Core type definitions shared by the decorators, the metadata model and the
 * conventions. This module defines metadata keys, column types and the type
 * mapping used to decide whether a member is a mapped scalar.
 */

import type { ConventionSet, ConventionSetDependencies } from './conventions/convention-set';
import type { ModelDiagnostics } from './diagnostics';
import type { Logger, LogLevel } from './logger';
import type { ParameterBindingFactories } from './parameter-binding';
import type { TypeInspector } from './reflection';

/**
 * Metadata keys for storing entity and member information.
 * Using Symbols prevents naming collisions in the metadata registry.
 */
export const ENTITY_KEY = Symbol('entity');
export const MEMBERS_KEY = Symbol('members');
export const COLUMN_KEY = Symbol('column');
export const PRIMARY_KEY = Symbol('primary');
export const FOREIGN_KEY = Symbol('foreignKey');
export const INVERSE_PROPERTY_KEY = Symbol('inverseProperty');
export const NAVIGATION_KEY = Symbol('navigation');
export const NOT_MAPPED_KEY = Symbol('notMapped');
export const DATABASE_GENERATED_KEY = Symbol('databaseGenerated');
export const OWNED_KEY = Symbol('owned');
export const KEYLESS_KEY = Symbol('keyless');
export const CONTAINER_KEY = Symbol('container');
export const MEMBER_TYPE_KEY = Symbol('memberType');

/**
 * Marks a navigation member whose type is another entity class.
 *
 * The alias keeps `emitDecoratorMetadata` from referencing the target class
 * eagerly, so two classes can point at each other in one module.
 *
 * @example
 * ```typescript
 * class Order {
 *   @Navigation(() => Customer)
 *   customer!: Related<Customer>;
 * }
 * ```
 */
export type Related<T> = T;

/**
 * A member discovered on an entity class.
 * Member objects are created once per decorated member and are stable, so
 * they can be compared by identity.
 */
export interface MemberInfo {
  /** Simple member name */
  readonly name: string;
  /** Class that declares the member */
  readonly declaringType: Function;
  /** Runtime type emitted by emitDecoratorMetadata, or given to `@Member` */
  readonly type: Function | undefined;
}

/**
 * Store-facing column types.
 */
export type ColumnType =
  | 'text'
  | 'integer'
  | 'smallint'
  | 'tinyint'
  | 'bigint'
  | 'real'
  | 'boolean'
  | 'date'
  | 'uuid'
  | 'json';

/**
 * Supported runtime types for column mapping.
 */
export type SupportedType = 'String' | 'Number' | 'Boolean' | 'Date' | 'BigInt';

/**
 * Maps TypeScript runtime types to column types.
 * A member whose runtime type is not listed here has no scalar mapping.
 */
export const TYPE_MAP: Record<SupportedType, ColumnType> = {
  String: 'text',
  Number: 'integer',
  Boolean: 'boolean',
  Date: 'date',
  BigInt: 'bigint',
};

export function isSupportedType(name: string): name is SupportedType {
  return Object.prototype.hasOwnProperty.call(TYPE_MAP, name);
}

/**
 * How a property's value is produced by the store.
 */
export type ValueGenerated = 'never' | 'onAdd' | 'onAddOrUpdate';

/**
 * Attribute payloads recorded by member decorators.
 */
export interface ColumnAttribute {
  /** Column name in the store */
  name: string;
  /** Explicit column type overriding the runtime type mapping */
  type?: ColumnType;
}

export interface NavigationAttribute {
  /** Deferred reference to the target entity class */
  target: () => Function;
  /** Collection navigation; inferred from design:type when omitted */
  collection?: boolean;
}

export interface MemberAttributes {
  column: ColumnAttribute;
  key: true;
  foreignKey: string;
  inverseProperty: string;
  navigation: NavigationAttribute;
  notMapped: true;
  databaseGenerated: ValueGenerated;
  /** Deferred runtime type given to `@Member` */
  memberType: () => Function;
}

export interface TypeAttributes {
  entity: string;
  owned: true;
  keyless: true;
  container: string;
}

export const MEMBER_ATTRIBUTE_KEYS: { [K in keyof MemberAttributes]: symbol } = {
  column: COLUMN_KEY,
  key: PRIMARY_KEY,
  foreignKey: FOREIGN_KEY,
  inverseProperty: INVERSE_PROPERTY_KEY,
  navigation: NAVIGATION_KEY,
  notMapped: NOT_MAPPED_KEY,
  databaseGenerated: DATABASE_GENERATED_KEY,
  memberType: MEMBER_TYPE_KEY,
};

export const TYPE_ATTRIBUTE_KEYS: { [K in keyof TypeAttributes]: symbol } = {
  entity: ENTITY_KEY,
  owned: OWNED_KEY,
  keyless: KEYLESS_KEY,
  container: CONTAINER_KEY,
};

/**
 * Well-known annotation names.
 */
export const AnnotationNames = {
  TableName: 'Relational:TableName',
  ColumnName: 'Relational:ColumnName',
  ContainerName: 'DocumentStore:ContainerName',
  PropertyName: 'DocumentStore:PropertyName',
  ValueGeneratorFactory: 'ValueGeneratorFactory',
} as const;

/**
 * Options accepted by `ModelBuilder` and `defineConfig()`.
 */
export interface ModelBuilderOptions {
  /** Entity classes registered when the model is built */
  entities: Function[];
  /** Stock convention set, or a factory producing a custom one. Default: 'core' */
  conventions?: 'core' | 'document' | ConventionSetFactory;
  /** false/undefined silences logging; true reads MODEL_BUILDER_LOG_LEVEL */
  logging?: boolean | LogLevel;
  /** Logger to write to instead of a new pino instance */
  logger?: Logger;
  /** Diagnostics sink; defaults to structured records on the logger */
  diagnostics?: ModelDiagnostics;
  /** Types bound to members as injected services */
  serviceTypes?: Function[];
  bindingFactories?: ParameterBindingFactories;
  inspector?: TypeInspector;
  /** Nested convention dispatch limit. Default: 64 */
  maxConventionDepth?: number;
}

export type ConventionSetFactory = (dependencies: ConventionSetDependencies) => ConventionSet;
