import { ConfigurationSource, overrides } from "./configuration-source";
import { EntityType } from "./entity-type";
import { Model } from "./model";
import { InternalEntityTypeBuilder } from "./internal-entity-type-builder";
import { ModelConfigurationError, ModelErrorCode, ModelStateError } from "../errors";
import type { ConventionDispatcher } from "../conventions/convention-dispatcher";
import type { TypeInspector } from "../reflection";

/**
 * Mutation entry point for the model. Every call takes the configuration
 * source it acts on behalf of and returns undefined when a higher source
 * already decided otherwise.
 */
export class InternalModelBuilder {
  constructor(
    readonly metadata: Model,
    readonly dispatcher: ConventionDispatcher,
    readonly inspector: TypeInspector
  ) {
    metadata.builder = this;
  }

  get isInModel(): boolean {
    return this.metadata.builder === this;
  }

  assertMutable(): void {
    if (this.metadata.isReadOnly) {
      throw new ModelStateError(
        "The model is finalized and can no longer be modified.",
        ModelErrorCode.MODEL_READ_ONLY
      );
    }
  }

  /**
   * Find or add the entity type for a class or name.
   *
   * @throws ModelConfigurationError when a different class already owns the name
   */
  entity(
    type: Function | string,
    configurationSource: ConfigurationSource
  ): InternalEntityTypeBuilder | undefined {
    this.assertMutable();

    const name = Model.getTypeName(type);
    const clrType = typeof type === "function" ? type : undefined;

    const existing = this.metadata.findEntityType(name);
    if (existing) {
      if (clrType && existing.clrType !== clrType) {
        throw new ModelConfigurationError(
          `Cannot add entity type for class '${name}': the name is already used by another type.`,
          ModelErrorCode.CLASHING_ENTITY_TYPE,
          { entityType: name }
        );
      }
      existing.updateConfigurationSource(configurationSource);
      return existing.builder;
    }

    const ignoredSource = this.metadata.findIgnoredConfigurationSource(name);
    if (ignoredSource !== undefined) {
      if (!overrides(configurationSource, ignoredSource)) {
        return undefined;
      }
      this.metadata.removeIgnored(name);
    }

    const entityType = new EntityType(name, this.metadata, clrType, configurationSource);
    const entityTypeBuilder = new InternalEntityTypeBuilder(entityType, this);
    this.metadata.addEntityType(entityType);

    return this.dispatcher.raise("entityTypeAdded", entityTypeBuilder, entityTypeBuilder);
  }

  ignore(type: Function | string, configurationSource: ConfigurationSource): boolean {
    this.assertMutable();

    const name = Model.getTypeName(type);
    if (this.metadata.findIgnoredConfigurationSource(name) !== undefined) {
      this.metadata.addIgnored(name, configurationSource);
      return true;
    }

    const entityType = this.metadata.findEntityType(name);
    if (entityType && !this.hasNoEntityType(entityType, configurationSource)) {
      return false;
    }

    this.metadata.addIgnored(name, configurationSource);
    this.dispatcher.raise(
      "entityTypeIgnored",
      name,
      this,
      name,
      typeof type === "function" ? type : undefined
    );
    return true;
  }

  /**
   * True when the type is ignored at a source that `configurationSource`
   * cannot override. Explicit configuration is never ignored.
   */
  isIgnored(
    type: Function | string,
    configurationSource: ConfigurationSource = ConfigurationSource.Convention
  ): boolean {
    if (configurationSource === ConfigurationSource.Explicit) {
      return false;
    }
    const ignoredSource = this.metadata.findIgnoredConfigurationSource(type);
    return ignoredSource !== undefined && overrides(ignoredSource, configurationSource);
  }

  /**
   * Remove an entity type and everything that depends on it. Derived types
   * are re-parented to the removed type's base.
   */
  hasNoEntityType(entityType: EntityType, configurationSource: ConfigurationSource): boolean {
    this.assertMutable();

    const entityTypeBuilder = entityType.builder;
    if (!entityTypeBuilder) {
      return true;
    }
    if (!overrides(configurationSource, entityType.configurationSource)) {
      return false;
    }

    // Events about the type itself are dropped once it is out of the model
    this.dispatcher.delayConventions(() => {
      for (const derivedType of [...entityType.directlyDerivedTypes]) {
        derivedType.builder?.hasBaseType(
          entityType.baseType,
          derivedType.baseTypeConfigurationSource ?? ConfigurationSource.Convention
        );
      }

      for (const foreignKey of [...entityType.declaredReferencingForeignKeys]) {
        foreignKey.declaringEntityType.builder?.hasNoRelationship(
          foreignKey,
          ConfigurationSource.Explicit
        );
      }
      for (const foreignKey of entityType.getDeclaredForeignKeys()) {
        entityTypeBuilder.hasNoRelationship(foreignKey, ConfigurationSource.Explicit);
      }
      for (const key of entityType.getDeclaredKeys()) {
        entityTypeBuilder.hasNoKey(key, ConfigurationSource.Explicit);
      }
      for (const serviceProperty of entityType.getDeclaredServiceProperties()) {
        entityTypeBuilder.removeServiceProperty(serviceProperty, ConfigurationSource.Explicit);
      }
      for (const property of entityType.getDeclaredProperties()) {
        entityTypeBuilder.removeProperty(property, ConfigurationSource.Explicit);
      }

      if (entityType.baseType) {
        entityType.baseType.directlyDerivedTypes.delete(entityType);
        entityType.baseType = undefined;
      }

      this.metadata.removeEntityTypeEntry(entityType);
      entityType.builder = undefined;
    });

    this.dispatcher.raise("entityTypeRemoved", entityType, this, entityType);
    return true;
  }

  /**
   * Run the finalization conventions once, then freeze the model.
   */
  finalizeModel(): Model {
    this.assertMutable();
    this.dispatcher.raise("modelFinalized", this, this);
    this.metadata.isReadOnly = true;
    return this.metadata;
  }
}
