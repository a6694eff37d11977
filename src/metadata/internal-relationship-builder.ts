import { ConfigurationSource, max, overrides } from "./configuration-source";
import type { EntityType } from "./entity-type";
import type { ForeignKey } from "./foreign-key";
import { sameProperties } from "./key";
import { Navigation } from "./navigation";
import type { Property } from "./property";
import type { InternalModelBuilder } from "./internal-model-builder";
import { ModelConfigurationError, ModelErrorCode } from "../errors";
import type { MemberInfo } from "../types";

/**
 * Builder for one foreign key. Every method returns undefined once the
 * foreign key has left the model, so callers can chain with `?.`.
 */
export class InternalRelationshipBuilder {
  constructor(
    readonly metadata: ForeignKey,
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

  /**
   * Set or clear the navigation on one side of the relationship.
   *
   * @param navigation member to navigate through, or undefined to clear
   * @param pointsToPrincipal true for the dependent-to-principal side
   * @throws ModelConfigurationError for an explicit collection on the dependent side
   */
  hasNavigation(
    navigation: MemberInfo | undefined,
    pointsToPrincipal: boolean,
    configurationSource: ConfigurationSource
  ): InternalRelationshipBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const foreignKey = this.metadata;
    const existing = foreignKey.getNavigation(pointsToPrincipal);
    if (existing?.name === navigation?.name) {
      if (existing) {
        if (pointsToPrincipal) {
          foreignKey.updateDependentToPrincipalConfigurationSource(configurationSource);
        } else {
          foreignKey.updatePrincipalToDependentConfigurationSource(configurationSource);
        }
        foreignKey.updateConfigurationSource(configurationSource);
      }
      return this;
    }

    if (!overrides(configurationSource, foreignKey.getNavigationConfigurationSource(pointsToPrincipal))) {
      return undefined;
    }

    const sourceType = pointsToPrincipal ? foreignKey.declaringEntityType : foreignKey.principalEntityType;
    const targetType = pointsToPrincipal ? foreignKey.principalEntityType : foreignKey.declaringEntityType;
    const sourceBuilder = sourceType.builder;
    const targetBuilder = targetType.builder;
    if (!sourceBuilder || !targetBuilder) {
      return undefined;
    }

    let isCollection = false;
    if (navigation) {
      const name = navigation.name;
      if (!sourceBuilder.canAddNavigation(name, configurationSource)) {
        return undefined;
      }

      isCollection = this.modelBuilder.inspector.isCollection(navigation);
      if (pointsToPrincipal && isCollection) {
        if (configurationSource === ConfigurationSource.Explicit) {
          throw new ModelConfigurationError(
            `Collection navigation '${sourceType.displayName()}.${name}' cannot point to the principal of ${foreignKey}.`,
            ModelErrorCode.INVALID_NAVIGATION,
            { entityType: sourceType.name, navigation: name }
          );
        }
        return undefined;
      }
      if (
        !pointsToPrincipal &&
        foreignKey.isUnique === isCollection &&
        !overrides(configurationSource, foreignKey.isUniqueConfigurationSource)
      ) {
        return undefined;
      }

      for (const conflicting of sourceType.findNavigationsInHierarchy(name)) {
        const otherForeignKey = conflicting.foreignKey;
        if (otherForeignKey === foreignKey) {
          continue;
        }
        if (!overrides(configurationSource, conflicting.configurationSource)) {
          return undefined;
        }
        otherForeignKey.builder?.hasNavigation(undefined, conflicting.isDependentToPrincipal, configurationSource);
        if (
          otherForeignKey.isInModel &&
          otherForeignKey.getNavigations().length === 0 &&
          overrides(configurationSource, otherForeignKey.configurationSource)
        ) {
          otherForeignKey.declaringEntityType.builder?.hasNoRelationship(otherForeignKey, configurationSource);
        }
      }

      for (const property of sourceType.findPropertiesInHierarchy(name)) {
        if (!property.declaringEntityType.builder?.removeProperty(property, configurationSource)) {
          return undefined;
        }
      }
      const serviceProperty = sourceType.findServiceProperty(name);
      if (
        serviceProperty &&
        !serviceProperty.declaringEntityType.builder?.removeServiceProperty(serviceProperty, configurationSource)
      ) {
        return undefined;
      }

      if (!this.isInModel) {
        return undefined;
      }
      if (!pointsToPrincipal && foreignKey.isUnique === isCollection) {
        foreignKey.isUnique = !isCollection;
        foreignKey.isUniqueConfigurationSource = configurationSource;
      }
    }

    const created = navigation
      ? new Navigation(navigation.name, foreignKey, pointsToPrincipal, navigation)
      : undefined;
    if (pointsToPrincipal) {
      foreignKey.dependentToPrincipal = created;
      foreignKey.dependentToPrincipalConfigurationSource = created ? configurationSource : undefined;
    } else {
      foreignKey.principalToDependent = created;
      foreignKey.principalToDependentConfigurationSource = created ? configurationSource : undefined;
    }
    if (created) {
      foreignKey.updateConfigurationSource(configurationSource);
    }

    if (existing) {
      this.dispatcher.raise(
        "navigationRemoved",
        existing.name,
        sourceBuilder,
        targetBuilder,
        existing.name,
        existing.memberInfo
      );
    }
    if (created && this.isInModel) {
      this.dispatcher.raise("navigationAdded", created, this, created);
    }

    return this.isInModel ? this : undefined;
  }

  /**
   * Pin the dependent properties of the foreign key.
   *
   * @throws ModelConfigurationError when a non-convention source names a
   * different number of properties than the principal key has
   */
  hasForeignKey(
    properties: readonly Property[],
    configurationSource: ConfigurationSource
  ): InternalRelationshipBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const foreignKey = this.metadata;
    if (sameProperties(foreignKey.properties, properties)) {
      foreignKey.updatePropertiesConfigurationSource(configurationSource);
      foreignKey.updateConfigurationSource(configurationSource);
      for (const property of properties) {
        property.updateConfigurationSource(configurationSource);
      }
      return this;
    }
    if (!overrides(configurationSource, foreignKey.propertiesConfigurationSource)) {
      return undefined;
    }

    const principalKey = foreignKey.principalKey;
    if (properties.length !== principalKey.properties.length) {
      if (configurationSource === ConfigurationSource.Convention) {
        return undefined;
      }
      throw new ModelConfigurationError(
        `The foreign key ${foreignKey} names ${properties.length} properties but the principal key ${principalKey} has ${principalKey.properties.length}.`,
        ModelErrorCode.FOREIGN_KEY_COUNT_MISMATCH,
        { foreignKey: foreignKey.toString(), principalKey: principalKey.toString() }
      );
    }

    const dependent = foreignKey.declaringEntityType;
    if (!properties.every((p) => p.isInModel && p.declaringEntityType.isSameHierarchy(dependent))) {
      return undefined;
    }

    const oldProperties = foreignKey.properties;
    for (const property of oldProperties) {
      property.foreignKeys.delete(foreignKey);
    }
    foreignKey.properties = properties;
    for (const property of properties) {
      property.foreignKeys.add(foreignKey);
    }
    foreignKey.propertiesConfigurationSource = configurationSource;
    foreignKey.updateConfigurationSource(configurationSource);

    const result = this.dispatcher.raise(
      "foreignKeyPropertiesChanged",
      this,
      this,
      oldProperties,
      principalKey
    );

    const released = oldProperties.filter((p) => !properties.includes(p));
    dependent.builder?.removeUnusedShadowProperties(released);

    return result;
  }

  /**
   * Swap principal and dependent. Navigations switch sides with the ends;
   * a new foreign key replaces this one, so callers must use the returned
   * builder.
   */
  hasEntityTypes(
    principalEntityType: EntityType,
    dependentEntityType: EntityType,
    configurationSource: ConfigurationSource
  ): InternalRelationshipBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const foreignKey = this.metadata;
    if (
      foreignKey.principalEntityType === principalEntityType &&
      foreignKey.declaringEntityType === dependentEntityType
    ) {
      foreignKey.principalEndConfigurationSource = max(
        foreignKey.principalEndConfigurationSource,
        configurationSource
      );
      return this;
    }
    if (
      foreignKey.principalEntityType !== dependentEntityType ||
      foreignKey.declaringEntityType !== principalEntityType
    ) {
      return undefined;
    }
    if (
      !overrides(configurationSource, foreignKey.principalEndConfigurationSource) ||
      !overrides(configurationSource, foreignKey.propertiesConfigurationSource) ||
      !overrides(configurationSource, foreignKey.configurationSource)
    ) {
      return undefined;
    }

    const toPrincipal = foreignKey.dependentToPrincipal;
    const toDependent = foreignKey.principalToDependent;
    // The old principal-side navigation now points to the principal
    if (toDependent?.isCollection()) {
      return undefined;
    }
    if ((toPrincipal && !toPrincipal.memberInfo) || (toDependent && !toDependent.memberInfo)) {
      return undefined;
    }

    const dependentBuilder = dependentEntityType.builder;
    const oldDependentBuilder = foreignKey.declaringEntityType.builder;
    if (!dependentBuilder || !oldDependentBuilder) {
      return undefined;
    }

    const unique = foreignKey.isUnique;
    const uniqueSource = foreignKey.isUniqueConfigurationSource ?? ConfigurationSource.Convention;
    const required = foreignKey.isRequired;
    const requiredSource = foreignKey.isRequiredConfigurationSource;
    const toPrincipalSource = foreignKey.dependentToPrincipalConfigurationSource ?? configurationSource;
    const toDependentSource = foreignKey.principalToDependentConfigurationSource ?? configurationSource;
    const source = max(configurationSource, foreignKey.configurationSource) ?? configurationSource;

    const inverted = this.dispatcher.delayConventions(() => {
      oldDependentBuilder.hasNoRelationship(foreignKey, configurationSource);

      let relationship = dependentBuilder.createForeignKey(
        principalEntityType,
        source,
        toDependent?.name
      );
      if (!relationship) {
        return undefined;
      }
      relationship.metadata.principalEndConfigurationSource = configurationSource;
      if (unique) {
        relationship = relationship.isUnique(true, uniqueSource);
      }
      if (relationship && requiredSource !== undefined) {
        relationship = relationship.isRequired(required, requiredSource);
      }
      if (relationship && toDependent?.memberInfo) {
        relationship = relationship.hasNavigation(toDependent.memberInfo, true, toDependentSource);
      }
      if (relationship && toPrincipal?.memberInfo) {
        relationship = relationship.hasNavigation(toPrincipal.memberInfo, false, toPrincipalSource);
      }
      return relationship;
    });

    return inverted?.isInModel ? inverted : undefined;
  }

  isUnique(unique: boolean, configurationSource: ConfigurationSource): InternalRelationshipBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const foreignKey = this.metadata;
    if (foreignKey.isUnique === unique) {
      foreignKey.isUniqueConfigurationSource = max(foreignKey.isUniqueConfigurationSource, configurationSource);
      return this;
    }
    if (!overrides(configurationSource, foreignKey.isUniqueConfigurationSource)) {
      return undefined;
    }

    // The principal-side navigation fixes the cardinality
    const toDependent = foreignKey.principalToDependent;
    if (toDependent?.memberInfo && this.modelBuilder.inspector.isCollection(toDependent.memberInfo) === unique) {
      return undefined;
    }

    foreignKey.isUnique = unique;
    foreignKey.isUniqueConfigurationSource = configurationSource;
    return this;
  }

  isRequired(required: boolean, configurationSource: ConfigurationSource): InternalRelationshipBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const foreignKey = this.metadata;
    if (foreignKey.isRequired === required) {
      foreignKey.isRequiredConfigurationSource = max(foreignKey.isRequiredConfigurationSource, configurationSource);
      return this;
    }
    if (!overrides(configurationSource, foreignKey.isRequiredConfigurationSource)) {
      return undefined;
    }

    foreignKey.isRequired = required;
    foreignKey.isRequiredConfigurationSource = configurationSource;
    return this;
  }

  isOwnership(ownership: boolean, configurationSource: ConfigurationSource): InternalRelationshipBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const foreignKey = this.metadata;
    if (foreignKey.isOwnership === ownership) {
      foreignKey.isOwnershipConfigurationSource = max(foreignKey.isOwnershipConfigurationSource, configurationSource);
      return this;
    }
    if (!overrides(configurationSource, foreignKey.isOwnershipConfigurationSource)) {
      return undefined;
    }

    foreignKey.isOwnership = ownership;
    foreignKey.isOwnershipConfigurationSource = configurationSource;
    if (ownership) {
      foreignKey.isRequired = true;
      foreignKey.isRequiredConfigurationSource = max(foreignKey.isRequiredConfigurationSource, configurationSource);
    }

    return this.dispatcher.raise("foreignKeyOwnershipChanged", this, this);
  }
}
