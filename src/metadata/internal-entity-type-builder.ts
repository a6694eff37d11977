import { ConfigurationSource, max, overrides } from "./configuration-source";
import type { Annotation } from "./annotatable";
import type { EntityType } from "./entity-type";
import { ForeignKey } from "./foreign-key";
import { Key, formatProperties, sameProperties } from "./key";
import { Property } from "./property";
import { ServiceProperty } from "./service-property";
import { InternalKeyBuilder } from "./internal-key-builder";
import { InternalPropertyBuilder } from "./internal-property-builder";
import { InternalRelationshipBuilder } from "./internal-relationship-builder";
import { InternalServicePropertyBuilder } from "./internal-service-property-builder";
import type { InternalModelBuilder } from "./internal-model-builder";
import { ModelConfigurationError, ModelErrorCode } from "../errors";
import type { ColumnType, MemberInfo } from "../types";

export interface PropertyOptions {
  /** Identifying member; omit for a shadow property */
  memberInfo?: MemberInfo;
  columnType?: ColumnType;
  typeConfigurationSource?: ConfigurationSource;
}

const TEMPORARY_KEY_NAME = "tempId";

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function camelize(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

export class InternalEntityTypeBuilder {
  constructor(
    readonly metadata: EntityType,
    readonly modelBuilder: InternalModelBuilder
  ) {
    metadata.builder = this;
  }

  get isInModel(): boolean {
    return this.metadata.builder === this;
  }

  private get dispatcher() {
    return this.modelBuilder.dispatcher;
  }

  // Properties

  /**
   * Find or add a scalar property. An existing property keeps its type unless
   * the new type source may override the old one.
   */
  property(
    name: string,
    clrType: Function,
    configurationSource: ConfigurationSource,
    options: PropertyOptions = {}
  ): InternalPropertyBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;

    const existing = entityType.findProperty(name);
    if (existing) {
      existing.updateConfigurationSource(configurationSource);
      if (clrType !== existing.clrType) {
        const typeSource = options.typeConfigurationSource;
        if (typeSource === undefined || !overrides(typeSource, existing.typeConfigurationSource)) {
          return undefined;
        }
        existing.clrType = clrType;
        existing.columnType = options.columnType ?? Property.defaultColumnType(clrType);
        existing.typeConfigurationSource = typeSource;
      }
      return existing.builder;
    }

    if (this.isIgnored(name, configurationSource)) {
      return undefined;
    }

    for (const navigation of entityType.findNavigationsInHierarchy(name)) {
      const owner = navigation.foreignKey.builder;
      if (!owner?.hasNavigation(undefined, navigation.isDependentToPrincipal, configurationSource)) {
        return undefined;
      }
    }

    const serviceProperty = entityType.findServiceProperty(name);
    if (
      serviceProperty &&
      !serviceProperty.declaringEntityType.builder?.removeServiceProperty(
        serviceProperty,
        configurationSource
      )
    ) {
      return undefined;
    }

    for (const derivedType of entityType.getDerivedTypes()) {
      const duplicate = derivedType.findDeclaredProperty(name);
      if (duplicate) {
        configurationSource = max(configurationSource, duplicate.configurationSource) ?? configurationSource;
        derivedType.builder?.removeProperty(duplicate, duplicate.configurationSource);
      }
    }

    const property = new Property(
      name,
      entityType,
      clrType,
      options.memberInfo,
      configurationSource,
      options.typeConfigurationSource,
      options.columnType
    );
    entityType.addProperty(property);
    const propertyBuilder = new InternalPropertyBuilder(property, this.modelBuilder);

    return this.dispatcher.raise("propertyAdded", propertyBuilder, propertyBuilder);
  }

  /**
   * Resolve names to properties, creating any that are backed by a member.
   * Names with no member become shadow properties only when the referenced
   * properties supply their types.
   */
  getOrCreateProperties(
    names: readonly string[] | undefined,
    configurationSource: ConfigurationSource,
    referencedProperties?: readonly Property[]
  ): Property[] | undefined {
    if (!names) {
      return undefined;
    }

    const entityType = this.metadata;
    const clrType = entityType.clrType;
    const properties: Property[] = [];

    for (let i = 0; i < names.length; i++) {
      const member = clrType ? this.modelBuilder.inspector.findMember(clrType, names[i]) : undefined;
      const name = member?.name ?? names[i];

      const existing = entityType.findProperty(name);
      if (existing) {
        existing.updateConfigurationSource(configurationSource);
        properties.push(existing);
        continue;
      }

      let created: InternalPropertyBuilder | undefined;
      if (member?.type) {
        created = this.property(name, member.type, configurationSource, {
          memberInfo: member,
          columnType: this.modelBuilder.inspector.findColumnType(member),
        });
      } else if (referencedProperties && referencedProperties[i]) {
        created = this.property(name, referencedProperties[i].clrType, configurationSource, {
          columnType: referencedProperties[i].columnType,
        });
      }

      if (!created) {
        return undefined;
      }
      properties.push(created.metadata);
    }

    return properties;
  }

  /**
   * Remove a property together with the keys and foreign keys that contain
   * it. Refused when any of them is pinned above `configurationSource`.
   */
  removeProperty(property: Property, configurationSource: ConfigurationSource): boolean {
    this.modelBuilder.assertMutable();
    if (!property.isInModel) {
      return true;
    }
    if (!overrides(configurationSource, property.configurationSource)) {
      return false;
    }
    for (const foreignKey of property.foreignKeys) {
      if (!overrides(configurationSource, foreignKey.configurationSource)) {
        return false;
      }
    }
    for (const key of property.keys) {
      if (!overrides(configurationSource, key.configurationSource)) {
        return false;
      }
    }

    for (const foreignKey of [...property.foreignKeys]) {
      foreignKey.declaringEntityType.builder?.hasNoRelationship(foreignKey, configurationSource);
    }
    for (const key of [...property.keys]) {
      key.declaringEntityType.builder?.hasNoKey(key, configurationSource);
    }

    const declaringType = property.declaringEntityType;
    const declaringBuilder = declaringType.builder ?? this;
    declaringType.removePropertyEntry(property.name);
    property.builder = undefined;

    this.dispatcher.raise("propertyRemoved", property, declaringBuilder, property);
    return true;
  }

  removeUnusedShadowProperties(
    properties: readonly Property[],
    configurationSource: ConfigurationSource = ConfigurationSource.Convention
  ): void {
    for (const property of properties) {
      if (
        property.isInModel &&
        property.isShadowProperty() &&
        !property.isKey() &&
        !property.isForeignKey() &&
        overrides(configurationSource, property.configurationSource)
      ) {
        (property.declaringEntityType.builder ?? this).removeProperty(property, configurationSource);
      }
    }
  }

  // Service properties

  serviceProperty(
    memberInfo: MemberInfo,
    configurationSource: ConfigurationSource
  ): InternalServicePropertyBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;
    const name = memberInfo.name;

    const existing = entityType.findServiceProperty(name);
    if (existing) {
      existing.updateConfigurationSource(configurationSource);
      return existing.builder;
    }

    if (this.isIgnored(name, configurationSource)) {
      return undefined;
    }

    const property = entityType.findProperty(name);
    if (property && !(property.declaringEntityType.builder ?? this).removeProperty(property, configurationSource)) {
      return undefined;
    }

    for (const navigation of entityType.findNavigationsInHierarchy(name)) {
      if (
        !navigation.foreignKey.builder?.hasNavigation(
          undefined,
          navigation.isDependentToPrincipal,
          configurationSource
        )
      ) {
        return undefined;
      }
    }

    const serviceProperty = new ServiceProperty(
      name,
      entityType,
      memberInfo.type ?? Object,
      memberInfo,
      configurationSource
    );
    entityType.addServiceProperty(serviceProperty);
    return new InternalServicePropertyBuilder(serviceProperty, this.modelBuilder);
  }

  removeServiceProperty(
    serviceProperty: ServiceProperty,
    configurationSource: ConfigurationSource
  ): boolean {
    this.modelBuilder.assertMutable();
    if (!serviceProperty.isInModel) {
      return true;
    }
    if (!overrides(configurationSource, serviceProperty.configurationSource)) {
      return false;
    }
    serviceProperty.declaringEntityType.removeServicePropertyEntry(serviceProperty.name);
    serviceProperty.builder = undefined;
    return true;
  }

  // Ignored members

  /**
   * Exclude a member name from the type and its derived types, removing
   * whatever currently maps it.
   */
  ignore(name: string, configurationSource: ConfigurationSource): boolean {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;

    if (entityType.findDeclaredIgnoredConfigurationSource(name) !== undefined) {
      entityType.addIgnored(name, configurationSource);
      return true;
    }

    for (const property of entityType.findPropertiesInHierarchy(name)) {
      if (property.declaringEntityType !== entityType && property.declaringEntityType.isAssignableFrom(entityType)) {
        return false;
      }
      if (!(property.declaringEntityType.builder ?? this).removeProperty(property, configurationSource)) {
        return false;
      }
    }

    for (const navigation of entityType.findNavigationsInHierarchy(name)) {
      const foreignKey = navigation.foreignKey;
      const dependentBuilder = foreignKey.declaringEntityType.builder;
      if (
        overrides(configurationSource, foreignKey.configurationSource) &&
        foreignKey.configurationSource !== ConfigurationSource.Explicit &&
        dependentBuilder
      ) {
        dependentBuilder.hasNoRelationship(foreignKey, configurationSource);
      } else if (
        !foreignKey.builder?.hasNavigation(undefined, navigation.isDependentToPrincipal, configurationSource)
      ) {
        return false;
      }
    }

    const serviceProperty = entityType.findServiceProperty(name);
    if (
      serviceProperty &&
      !(serviceProperty.declaringEntityType.builder ?? this).removeServiceProperty(
        serviceProperty,
        configurationSource
      )
    ) {
      return false;
    }

    entityType.addIgnored(name, configurationSource);
    this.dispatcher.raise("entityTypeMemberIgnored", name, this, name);
    return true;
  }

  /**
   * True when the member is ignored at a source that `configurationSource`
   * cannot override. Explicit configuration is never ignored.
   */
  isIgnored(
    name: string,
    configurationSource: ConfigurationSource = ConfigurationSource.Convention
  ): boolean {
    if (configurationSource === ConfigurationSource.Explicit) {
      return false;
    }
    const ignoredSource = this.metadata.findIgnoredConfigurationSource(name);
    return ignoredSource !== undefined && overrides(ignoredSource, configurationSource);
  }

  canAddNavigation(name: string, configurationSource: ConfigurationSource): boolean {
    if (this.isIgnored(name, configurationSource)) {
      return false;
    }
    const property = this.metadata.findProperty(name);
    if (property && !overrides(configurationSource, property.configurationSource)) {
      return false;
    }
    const serviceProperty = this.metadata.findServiceProperty(name);
    return !serviceProperty || overrides(configurationSource, serviceProperty.configurationSource);
  }

  // Inheritance

  /**
   * @throws ModelConfigurationError when the new base would form a cycle or
   * its class is not a base class of this type's class
   */
  hasBaseType(
    baseType: EntityType | undefined,
    configurationSource: ConfigurationSource
  ): InternalEntityTypeBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;

    if (entityType.baseType === baseType) {
      if (baseType) {
        entityType.baseTypeConfigurationSource = max(entityType.baseTypeConfigurationSource, configurationSource);
      }
      return this;
    }
    if (!overrides(configurationSource, entityType.baseTypeConfigurationSource)) {
      return undefined;
    }

    if (baseType) {
      const inspector = this.modelBuilder.inspector;
      if (
        entityType.isAssignableFrom(baseType) ||
        (entityType.clrType &&
          baseType.clrType &&
          !inspector.isAssignableFrom(baseType.clrType, entityType.clrType))
      ) {
        throw new ModelConfigurationError(
          `'${baseType.displayName()}' cannot be the base type of '${entityType.displayName()}'.`,
          ModelErrorCode.INVALID_BASE_TYPE,
          { entityType: entityType.name, baseType: baseType.name }
        );
      }

      if (entityType.getDeclaredKeys().some((k) => !overrides(configurationSource, k.configurationSource))) {
        return undefined;
      }
    }

    // Removals are delivered once the type is derived, so key discovery leaves it alone
    this.dispatcher.delayConventions(() => {
      if (baseType) {
        for (const key of entityType.getDeclaredKeys()) {
          this.hasNoKey(key, configurationSource);
        }
        for (const property of entityType.getDeclaredProperties()) {
          if (baseType.findProperty(property.name)) {
            this.removeProperty(property, property.configurationSource);
          }
        }
        for (const serviceProperty of entityType.getDeclaredServiceProperties()) {
          if (baseType.findServiceProperty(serviceProperty.name)) {
            this.removeServiceProperty(serviceProperty, serviceProperty.configurationSource);
          }
        }
      }

      const oldBaseType = entityType.baseType;
      oldBaseType?.directlyDerivedTypes.delete(entityType);
      entityType.baseType = baseType;
      entityType.baseTypeConfigurationSource = configurationSource;
      baseType?.directlyDerivedTypes.add(entityType);

      this.dispatcher.raise("entityTypeBaseTypeChanged", baseType, this, baseType, oldBaseType);
    });
    return this.isInModel ? this : undefined;
  }

  // Keys

  /**
   * Set or clear the primary key. A previous primary key that foreign keys
   * still reference stays as an alternate key.
   *
   * @throws ModelConfigurationError for an explicit key on a derived type
   */
  primaryKey(
    properties: readonly Property[] | undefined,
    configurationSource: ConfigurationSource
  ): InternalKeyBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;
    const previous = entityType.primaryKey;

    if (entityType.baseType) {
      if (properties && configurationSource === ConfigurationSource.Explicit) {
        throw new ModelConfigurationError(
          `A key cannot be configured on '${entityType.displayName()}' because it is a derived type.`,
          ModelErrorCode.KEY_ON_DERIVED_TYPE,
          { entityType: entityType.name }
        );
      }
      return undefined;
    }

    if (previous && properties && sameProperties(previous.properties, properties)) {
      entityType.primaryKeyConfigurationSource = max(entityType.primaryKeyConfigurationSource, configurationSource);
      previous.updateConfigurationSource(configurationSource);
      return previous.builder;
    }
    if (!overrides(configurationSource, entityType.primaryKeyConfigurationSource)) {
      return undefined;
    }

    if (!properties) {
      if (previous) {
        entityType.primaryKey = undefined;
        entityType.primaryKeyConfigurationSource = undefined;
        this.dispatcher.raise("entityTypePrimaryKeyChanged", undefined, this, undefined, previous);
      }
      return undefined;
    }

    const keyBuilder = this.hasKey(properties, configurationSource);
    if (!keyBuilder) {
      return undefined;
    }
    const key = keyBuilder.metadata;
    entityType.primaryKey = key;
    entityType.primaryKeyConfigurationSource = configurationSource;

    this.dispatcher.raise("entityTypePrimaryKeyChanged", key, this, key, previous);

    if (
      previous?.isInModel &&
      previous.referencingForeignKeys.size === 0 &&
      overrides(configurationSource, previous.configurationSource)
    ) {
      this.hasNoKey(previous, configurationSource);
    }

    return key.builder;
  }

  hasKey(
    properties: readonly Property[],
    configurationSource: ConfigurationSource
  ): InternalKeyBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;
    if (properties.length === 0) {
      return undefined;
    }

    const existing = entityType.findKey(properties);
    if (existing) {
      existing.updateConfigurationSource(configurationSource);
      return existing.builder;
    }

    if (entityType.baseType) {
      if (configurationSource === ConfigurationSource.Explicit) {
        throw new ModelConfigurationError(
          `Key ${formatProperties(properties)} cannot be added to '${entityType.displayName()}' because it is a derived type.`,
          ModelErrorCode.KEY_ON_DERIVED_TYPE,
          { entityType: entityType.name }
        );
      }
      return undefined;
    }

    if (!properties.every((p) => p.isInModel && p.declaringEntityType.isAssignableFrom(entityType))) {
      return undefined;
    }

    if (entityType.isKeyless) {
      if (!overrides(configurationSource, entityType.isKeylessConfigurationSource)) {
        return undefined;
      }
      entityType.isKeyless = false;
      entityType.isKeylessConfigurationSource = undefined;
    }

    const key = new Key(properties, entityType, configurationSource);
    for (const property of properties) {
      property.keys.add(key);
    }
    entityType.addKey(key);
    const keyBuilder = new InternalKeyBuilder(key, this.modelBuilder);

    return this.dispatcher.raise("keyAdded", keyBuilder, keyBuilder);
  }

  hasNoKey(key: Key, configurationSource: ConfigurationSource): boolean {
    this.modelBuilder.assertMutable();
    if (!key.isInModel) {
      return true;
    }
    if (!overrides(configurationSource, key.configurationSource)) {
      return false;
    }
    for (const foreignKey of key.referencingForeignKeys) {
      if (!overrides(configurationSource, foreignKey.configurationSource)) {
        return false;
      }
    }

    for (const foreignKey of [...key.referencingForeignKeys]) {
      foreignKey.declaringEntityType.builder?.hasNoRelationship(foreignKey, configurationSource);
    }

    const entityType = key.declaringEntityType;
    const declaringBuilder = entityType.builder ?? this;
    if (entityType.primaryKey === key) {
      entityType.primaryKey = undefined;
      entityType.primaryKeyConfigurationSource = undefined;
      this.dispatcher.raise("entityTypePrimaryKeyChanged", undefined, declaringBuilder, undefined, key);
    }

    entityType.removeKeyEntry(key);
    for (const property of key.properties) {
      property.keys.delete(key);
    }
    key.builder = undefined;

    this.dispatcher.raise("keyRemoved", key, declaringBuilder, key);
    return true;
  }

  isKeyless(keyless: boolean, configurationSource: ConfigurationSource): InternalEntityTypeBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;

    if (entityType.isKeyless === keyless) {
      entityType.isKeylessConfigurationSource = max(entityType.isKeylessConfigurationSource, configurationSource);
      return this;
    }
    if (!overrides(configurationSource, entityType.isKeylessConfigurationSource)) {
      return undefined;
    }

    if (keyless) {
      // Key removals are delivered once the type is keyless, so key discovery leaves it alone
      const removed = this.dispatcher.delayConventions(() => {
        for (const key of entityType.getDeclaredKeys()) {
          if (!this.hasNoKey(key, configurationSource)) {
            return false;
          }
        }
        entityType.isKeyless = true;
        entityType.isKeylessConfigurationSource = configurationSource;
        return true;
      });
      return removed ? this : undefined;
    }

    entityType.isKeyless = false;
    entityType.isKeylessConfigurationSource = configurationSource;
    return this;
  }

  // Annotations

  /**
   * Set an annotation; `undefined` removes it.
   */
  hasAnnotation(
    name: string,
    value: unknown,
    configurationSource: ConfigurationSource
  ): InternalEntityTypeBuilder | undefined {
    this.modelBuilder.assertMutable();
    const entityType = this.metadata;
    const existing = entityType.findAnnotation(name);

    if (existing && existing.value === value) {
      const source = max(existing.configurationSource, configurationSource) ?? configurationSource;
      entityType.setAnnotation(name, value, source);
      return this;
    }
    if (existing && !overrides(configurationSource, existing.configurationSource)) {
      return undefined;
    }
    if (!existing && value === undefined) {
      return this;
    }

    let annotation: Annotation | undefined;
    if (value === undefined) {
      entityType.removeAnnotation(name);
    } else {
      annotation = entityType.setAnnotation(name, value, configurationSource);
    }

    this.dispatcher.raise("entityTypeAnnotationChanged", annotation, this, name, annotation, existing);
    return this.isInModel ? this : undefined;
  }

  // Relationships

  /**
   * Find or create the relationship between this type and `targetEntityType`
   * through the given navigations.
   *
   * By default this type is the dependent. A collection `navigationToTarget`
   * makes it the principal instead. Many-to-many pairs are refused.
   */
  hasRelationship(
    targetEntityType: EntityType,
    navigationToTarget: MemberInfo | undefined,
    inverseNavigation: MemberInfo | undefined,
    configurationSource: ConfigurationSource,
    setTargetAsPrincipal = false
  ): InternalRelationshipBuilder | undefined {
    this.modelBuilder.assertMutable();
    const inspector = this.modelBuilder.inspector;
    const toTargetIsCollection = navigationToTarget ? inspector.isCollection(navigationToTarget) : false;
    const inverseIsCollection = inverseNavigation ? inspector.isCollection(inverseNavigation) : false;

    if (toTargetIsCollection && inverseIsCollection) {
      return undefined;
    }

    if (toTargetIsCollection && !setTargetAsPrincipal) {
      return targetEntityType.builder?.hasRelationship(
        this.metadata,
        inverseNavigation,
        navigationToTarget,
        configurationSource,
        true
      );
    }

    const dependent = this.metadata;
    const principal = targetEntityType;

    const existing = this.findRelationship(principal, navigationToTarget, inverseNavigation);
    if (existing) {
      const { foreignKey, toTargetPointsToPrincipal } = existing;
      let relationship: InternalRelationshipBuilder | undefined = foreignKey.builder;
      if (relationship && navigationToTarget) {
        relationship = relationship.hasNavigation(navigationToTarget, toTargetPointsToPrincipal, configurationSource);
      }
      if (relationship && inverseNavigation) {
        relationship = relationship.hasNavigation(inverseNavigation, !toTargetPointsToPrincipal, configurationSource);
      }
      relationship?.metadata.updateConfigurationSource(configurationSource);
      return relationship;
    }

    if (navigationToTarget && !this.canAddNavigation(navigationToTarget.name, configurationSource)) {
      return undefined;
    }
    if (
      inverseNavigation &&
      !principal.builder?.canAddNavigation(inverseNavigation.name, configurationSource)
    ) {
      return undefined;
    }

    const created = this.dispatcher.delayConventions(() => {
      let relationship = this.createForeignKey(
        principal,
        configurationSource,
        navigationToTarget?.name
      );
      if (relationship && inverseNavigation) {
        relationship = relationship.isUnique(!inverseIsCollection, ConfigurationSource.Convention);
      }
      if (relationship && navigationToTarget) {
        relationship = relationship.hasNavigation(navigationToTarget, true, configurationSource);
      }
      if (relationship && inverseNavigation) {
        relationship = relationship.hasNavigation(inverseNavigation, false, configurationSource);
      }
      return relationship;
    });

    if (created?.isInModel) {
      return created;
    }
    // Conventions may have replaced the relationship while events flushed
    return this.findRelationship(principal, navigationToTarget, inverseNavigation)?.foreignKey.builder;
  }

  private findRelationship(
    principal: EntityType,
    navigationToTarget: MemberInfo | undefined,
    inverseNavigation: MemberInfo | undefined
  ): { foreignKey: ForeignKey; toTargetPointsToPrincipal: boolean } | undefined {
    const dependent = this.metadata;
    if (navigationToTarget) {
      const navigation = dependent.findNavigation(navigationToTarget.name);
      if (navigation && navigation.targetEntityType.isSameHierarchy(principal)) {
        return { foreignKey: navigation.foreignKey, toTargetPointsToPrincipal: navigation.isDependentToPrincipal };
      }
    }
    if (inverseNavigation) {
      const navigation = principal.findNavigation(inverseNavigation.name);
      if (navigation && navigation.targetEntityType.isSameHierarchy(dependent)) {
        return { foreignKey: navigation.foreignKey, toTargetPointsToPrincipal: !navigation.isDependentToPrincipal };
      }
    }
    return undefined;
  }

  /**
   * Add a foreign key from this type to `principalEntityType`. Without
   * explicit properties a dependent property named after the navigation (or
   * the principal) and the principal key is reused or created as shadow.
   */
  createForeignKey(
    principalEntityType: EntityType,
    configurationSource: ConfigurationSource,
    navigationName?: string,
    dependentProperties?: readonly Property[]
  ): InternalRelationshipBuilder | undefined {
    this.modelBuilder.assertMutable();
    const dependent = this.metadata;

    let principalKey = principalEntityType.findPrimaryKey();
    if (!principalKey) {
      const rootBuilder = principalEntityType.getRootType().builder;
      const keyProperty = rootBuilder?.property(TEMPORARY_KEY_NAME, Number, ConfigurationSource.Convention);
      principalKey = keyProperty && rootBuilder?.hasKey([keyProperty.metadata], ConfigurationSource.Convention)?.metadata;
      if (!principalKey) {
        return undefined;
      }
    }

    const properties =
      dependentProperties ??
      this.findOrCreateForeignKeyProperties(principalEntityType, principalKey, navigationName);
    if (!properties || properties.length !== principalKey.properties.length) {
      return undefined;
    }

    const foreignKey = new ForeignKey(
      properties,
      principalKey,
      dependent,
      principalEntityType,
      configurationSource
    );
    if (dependentProperties) {
      foreignKey.propertiesConfigurationSource = configurationSource;
    }

    dependent.addForeignKey(foreignKey);
    principalEntityType.declaredReferencingForeignKeys.add(foreignKey);
    principalKey.referencingForeignKeys.add(foreignKey);
    for (const property of properties) {
      property.foreignKeys.add(foreignKey);
    }
    const relationshipBuilder = new InternalRelationshipBuilder(foreignKey, this.modelBuilder);

    return this.dispatcher.raise("foreignKeyAdded", relationshipBuilder, relationshipBuilder);
  }

  private findOrCreateForeignKeyProperties(
    principalEntityType: EntityType,
    principalKey: Key,
    navigationName: string | undefined
  ): Property[] | undefined {
    const dependent = this.metadata;
    const prefix = navigationName ?? camelize(principalEntityType.name);
    const properties: Property[] = [];

    for (const keyProperty of principalKey.properties) {
      const candidateNames = [`${prefix}${capitalize(keyProperty.name)}`];
      if (keyProperty.name.toLowerCase().startsWith(principalEntityType.name.toLowerCase())) {
        candidateNames.push(keyProperty.name);
      }

      const match = candidateNames
        .map((candidate) => this.findPropertyIgnoringCase(candidate))
        .find(
          (p): p is Property =>
            p !== undefined && !principalKey.properties.includes(p) && !properties.includes(p)
        );
      if (match) {
        properties.push(match);
        continue;
      }

      const shadow = this.property(candidateNames[0], keyProperty.clrType, ConfigurationSource.Convention, {
        columnType: keyProperty.columnType,
      });
      if (!shadow || principalKey.properties.includes(shadow.metadata)) {
        return undefined;
      }
      properties.push(shadow.metadata);
    }

    return dependent.isInModel ? properties : undefined;
  }

  private findPropertyIgnoringCase(name: string): Property | undefined {
    const lowered = name.toLowerCase();
    return (
      this.metadata.findProperty(name) ??
      this.metadata.getProperties().find((p) => p.name.toLowerCase() === lowered)
    );
  }

  /**
   * Make `targetEntityType` owned by this type through `navigationToTarget`.
   */
  hasOwnership(
    targetEntityType: EntityType,
    navigationToTarget: MemberInfo,
    inverseNavigation: MemberInfo | undefined,
    configurationSource: ConfigurationSource
  ): InternalRelationshipBuilder | undefined {
    const relationship = targetEntityType.builder?.hasRelationship(
      this.metadata,
      inverseNavigation,
      navigationToTarget,
      configurationSource,
      true
    );
    return relationship?.isOwnership(true, configurationSource);
  }

  /**
   * Remove a foreign key declared on this type. Shadow properties and the
   * temporary principal key it leaves unused go with it.
   */
  hasNoRelationship(foreignKey: ForeignKey, configurationSource: ConfigurationSource): boolean {
    this.modelBuilder.assertMutable();
    if (!foreignKey.isInModel) {
      return true;
    }
    if (!overrides(configurationSource, foreignKey.configurationSource)) {
      return false;
    }

    const dependent = foreignKey.declaringEntityType;
    const principalKey = foreignKey.principalKey;
    dependent.removeForeignKeyEntry(foreignKey);
    foreignKey.principalEntityType.declaredReferencingForeignKeys.delete(foreignKey);
    principalKey.referencingForeignKeys.delete(foreignKey);
    for (const property of foreignKey.properties) {
      property.foreignKeys.delete(foreignKey);
    }
    foreignKey.builder = undefined;

    const dependentBuilder = dependent.builder ?? this;
    this.dispatcher.raise("foreignKeyRemoved", foreignKey, dependentBuilder, foreignKey);

    if (dependentBuilder.isInModel) {
      dependentBuilder.removeUnusedShadowProperties(foreignKey.properties);
    }

    const principalBuilder = principalKey.declaringEntityType.builder;
    if (
      principalBuilder &&
      principalKey.isInModel &&
      !principalKey.isPrimaryKey() &&
      principalKey.referencingForeignKeys.size === 0 &&
      principalKey.configurationSource === ConfigurationSource.Convention
    ) {
      principalBuilder.hasNoKey(principalKey, ConfigurationSource.Convention);
      principalBuilder.removeUnusedShadowProperties(principalKey.properties);
    }

    return true;
  }
}
