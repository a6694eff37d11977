import { Annotatable } from "./annotatable";
import { ConfigurationSource, max } from "./configuration-source";
import { sameProperties } from "./key";
import { AnnotationNames } from "../types";
import type { Model } from "./model";
import type { Property } from "./property";
import type { Key } from "./key";
import type { ForeignKey } from "./foreign-key";
import type { Navigation } from "./navigation";
import type { ServiceProperty } from "./service-property";
import type { InternalEntityTypeBuilder } from "./internal-entity-type-builder";

/**
 * A mapped type. Holds declared members; effective members are the declared
 * ones plus everything inherited from the base type chain.
 *
 * Navigations are not stored here. They live on foreign keys and are
 * collected from the declared and referencing keys on demand.
 */
export class EntityType extends Annotatable {
  builder: InternalEntityTypeBuilder | undefined;

  baseType: EntityType | undefined;
  baseTypeConfigurationSource: ConfigurationSource | undefined;
  readonly directlyDerivedTypes = new Set<EntityType>();

  primaryKey: Key | undefined;
  primaryKeyConfigurationSource: ConfigurationSource | undefined;

  isKeyless = false;
  isKeylessConfigurationSource: ConfigurationSource | undefined;

  readonly declaredReferencingForeignKeys = new Set<ForeignKey>();

  private readonly properties = new Map<string, Property>();
  private readonly serviceProperties = new Map<string, ServiceProperty>();
  private readonly keys: Key[] = [];
  private readonly foreignKeys: ForeignKey[] = [];
  private readonly ignoredMembers = new Map<string, ConfigurationSource>();

  constructor(
    readonly name: string,
    readonly model: Model,
    readonly clrType: Function | undefined,
    public configurationSource: ConfigurationSource
  ) {
    super();
  }

  get isInModel(): boolean {
    return this.builder !== undefined;
  }

  displayName(): string {
    return this.name;
  }

  updateConfigurationSource(configurationSource: ConfigurationSource): void {
    this.configurationSource = max(this.configurationSource, configurationSource) ?? configurationSource;
  }

  // Hierarchy

  getRootType(): EntityType {
    return this.baseType ? this.baseType.getRootType() : this;
  }

  /** This type followed by its base types, most derived first */
  getTypesInHierarchyUp(): EntityType[] {
    const types: EntityType[] = [];
    for (let current: EntityType | undefined = this; current; current = current.baseType) {
      types.push(current);
    }
    return types;
  }

  getDerivedTypes(): EntityType[] {
    const derived: EntityType[] = [];
    for (const child of this.directlyDerivedTypes) {
      derived.push(child, ...child.getDerivedTypes());
    }
    return derived;
  }

  isAssignableFrom(derivedType: EntityType): boolean {
    return derivedType.getTypesInHierarchyUp().includes(this);
  }

  isSameHierarchy(other: EntityType): boolean {
    return this.isAssignableFrom(other) || other.isAssignableFrom(this);
  }

  // Properties

  getDeclaredProperties(): Property[] {
    return [...this.properties.values()];
  }

  getProperties(): Property[] {
    return this.getTypesInHierarchyUp()
      .reverse()
      .flatMap((t) => t.getDeclaredProperties());
  }

  findDeclaredProperty(name: string): Property | undefined {
    return this.properties.get(name);
  }

  findProperty(name: string): Property | undefined {
    return this.findDeclaredProperty(name) ?? this.baseType?.findProperty(name);
  }

  /** Resolves every name, or returns undefined when any is missing */
  findProperties(names: readonly string[]): Property[] | undefined {
    const found: Property[] = [];
    for (const name of names) {
      const property = this.findProperty(name);
      if (!property) {
        return undefined;
      }
      found.push(property);
    }
    return found;
  }

  findPropertiesInHierarchy(name: string): Property[] {
    const found: Property[] = [];
    const own = this.findProperty(name);
    if (own) {
      found.push(own);
    }
    for (const derived of this.getDerivedTypes()) {
      const property = derived.findDeclaredProperty(name);
      if (property) {
        found.push(property);
      }
    }
    return found;
  }

  /** @internal */
  addProperty(property: Property): void {
    this.properties.set(property.name, property);
  }

  /** @internal */
  removePropertyEntry(name: string): void {
    this.properties.delete(name);
  }

  // Service properties

  getDeclaredServiceProperties(): ServiceProperty[] {
    return [...this.serviceProperties.values()];
  }

  getServiceProperties(): ServiceProperty[] {
    return this.getTypesInHierarchyUp()
      .reverse()
      .flatMap((t) => t.getDeclaredServiceProperties());
  }

  findDeclaredServiceProperty(name: string): ServiceProperty | undefined {
    return this.serviceProperties.get(name);
  }

  findServiceProperty(name: string): ServiceProperty | undefined {
    return this.findDeclaredServiceProperty(name) ?? this.baseType?.findServiceProperty(name);
  }

  /** @internal */
  addServiceProperty(serviceProperty: ServiceProperty): void {
    this.serviceProperties.set(serviceProperty.name, serviceProperty);
  }

  /** @internal */
  removeServicePropertyEntry(name: string): void {
    this.serviceProperties.delete(name);
  }

  // Navigations

  getDeclaredNavigations(): Navigation[] {
    const navigations: Navigation[] = [];
    for (const foreignKey of this.foreignKeys) {
      if (foreignKey.dependentToPrincipal) {
        navigations.push(foreignKey.dependentToPrincipal);
      }
    }
    for (const foreignKey of this.declaredReferencingForeignKeys) {
      if (foreignKey.principalToDependent) {
        navigations.push(foreignKey.principalToDependent);
      }
    }
    return navigations;
  }

  getNavigations(): Navigation[] {
    return this.getTypesInHierarchyUp()
      .reverse()
      .flatMap((t) => t.getDeclaredNavigations());
  }

  findDeclaredNavigation(name: string): Navigation | undefined {
    return this.getDeclaredNavigations().find((n) => n.name === name);
  }

  findNavigation(name: string): Navigation | undefined {
    return this.findDeclaredNavigation(name) ?? this.baseType?.findNavigation(name);
  }

  findNavigationsInHierarchy(name: string): Navigation[] {
    const found: Navigation[] = [];
    const own = this.findNavigation(name);
    if (own) {
      found.push(own);
    }
    for (const derived of this.getDerivedTypes()) {
      const navigation = derived.findDeclaredNavigation(name);
      if (navigation) {
        found.push(navigation);
      }
    }
    return found;
  }

  // Keys

  findPrimaryKey(): Key | undefined {
    return this.getRootType().primaryKey;
  }

  getDeclaredKeys(): Key[] {
    return [...this.keys];
  }

  getKeys(): Key[] {
    return this.getTypesInHierarchyUp().flatMap((t) => t.getDeclaredKeys());
  }

  findKey(properties: readonly Property[]): Key | undefined {
    return this.getKeys().find((k) => sameProperties(k.properties, properties));
  }

  /** @internal */
  addKey(key: Key): void {
    this.keys.push(key);
  }

  /** @internal */
  removeKeyEntry(key: Key): void {
    const index = this.keys.indexOf(key);
    if (index >= 0) {
      this.keys.splice(index, 1);
    }
  }

  // Foreign keys

  getDeclaredForeignKeys(): ForeignKey[] {
    return [...this.foreignKeys];
  }

  getForeignKeys(): ForeignKey[] {
    return this.getTypesInHierarchyUp().flatMap((t) => t.getDeclaredForeignKeys());
  }

  findForeignKeys(properties: readonly Property[]): ForeignKey[] {
    return this.getForeignKeys().filter((fk) => sameProperties(fk.properties, properties));
  }

  getReferencingForeignKeys(): ForeignKey[] {
    return this.getTypesInHierarchyUp().flatMap((t) => [...t.declaredReferencingForeignKeys]);
  }

  /** @internal */
  addForeignKey(foreignKey: ForeignKey): void {
    this.foreignKeys.push(foreignKey);
  }

  /** @internal */
  removeForeignKeyEntry(foreignKey: ForeignKey): void {
    const index = this.foreignKeys.indexOf(foreignKey);
    if (index >= 0) {
      this.foreignKeys.splice(index, 1);
    }
  }

  // Ownership

  findOwnership(): ForeignKey | undefined {
    return this.getForeignKeys().find((fk) => fk.isOwnership);
  }

  isOwned(): boolean {
    return this.findOwnership() !== undefined;
  }

  /**
   * A document root is stored as its own document: it is not owned, or it
   * names a container of its own. Derived types follow their root.
   */
  isDocumentRoot(): boolean {
    if (this.baseType) {
      return this.baseType.isDocumentRoot();
    }
    return !this.isOwned() || this.findAnnotation(AnnotationNames.ContainerName) !== undefined;
  }

  // Ignored members

  findDeclaredIgnoredConfigurationSource(name: string): ConfigurationSource | undefined {
    return this.ignoredMembers.get(name);
  }

  findIgnoredConfigurationSource(name: string): ConfigurationSource | undefined {
    return (
      this.findDeclaredIgnoredConfigurationSource(name) ??
      this.baseType?.findIgnoredConfigurationSource(name)
    );
  }

  getIgnoredMembers(): string[] {
    return [...this.ignoredMembers.keys()];
  }

  /** @internal */
  addIgnored(name: string, configurationSource: ConfigurationSource): void {
    const existing = this.ignoredMembers.get(name);
    this.ignoredMembers.set(name, max(existing, configurationSource) ?? configurationSource);
  }

  /** @internal */
  removeIgnored(name: string): void {
    this.ignoredMembers.delete(name);
  }

  toString(): string {
    return this.displayName();
  }
}
