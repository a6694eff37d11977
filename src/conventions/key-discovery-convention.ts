import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalPropertyBuilder } from "../metadata/internal-property-builder";
import type { Key } from "../metadata/key";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeAddedConvention,
  EntityTypeBaseTypeChangedConvention,
  KeyRemovedConvention,
  PropertyAddedConvention,
} from "./convention-events";

/**
 * Makes a property named `id` or `<Type>Id` (any casing) the primary key.
 * Only root types get a key; a key set from any other source stays.
 */
export class KeyDiscoveryConvention
  implements
    EntityTypeAddedConvention,
    EntityTypeBaseTypeChangedConvention,
    PropertyAddedConvention,
    KeyRemovedConvention
{
  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    this.tryConfigurePrimaryKey(entityTypeBuilder);
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    _context: ConventionContext<EntityType | undefined>
  ): void {
    if (newBaseType === undefined) {
      this.tryConfigurePrimaryKey(entityTypeBuilder);
    }
  }

  processPropertyAdded(
    propertyBuilder: InternalPropertyBuilder,
    _context: ConventionContext<InternalPropertyBuilder>
  ): void {
    const entityTypeBuilder = propertyBuilder.metadata.declaringEntityType.builder;
    if (entityTypeBuilder) {
      this.tryConfigurePrimaryKey(entityTypeBuilder);
    }
  }

  processKeyRemoved(
    entityTypeBuilder: InternalEntityTypeBuilder,
    key: Key,
    _context: ConventionContext<Key>
  ): void {
    if (entityTypeBuilder.isInModel && key.declaringEntityType.primaryKey === undefined) {
      this.tryConfigurePrimaryKey(entityTypeBuilder);
    }
  }

  private tryConfigurePrimaryKey(entityTypeBuilder: InternalEntityTypeBuilder): void {
    const entityType = entityTypeBuilder.metadata;
    if (entityType.baseType || entityType.isKeyless) {
      return;
    }
    if (
      entityType.primaryKey &&
      entityType.primaryKeyConfigurationSource !== ConfigurationSource.Convention
    ) {
      return;
    }

    const candidates = ["id", `${entityType.name}id`.toLowerCase()];
    const properties = entityType.getProperties();
    for (const candidate of candidates) {
      const property = properties.find((p) => p.name.toLowerCase() === candidate);
      if (property) {
        entityTypeBuilder.primaryKey([property], ConfigurationSource.Convention);
        return;
      }
    }
  }
}
