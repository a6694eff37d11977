import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { Model } from "../metadata/model";
import type { ConventionContext } from "./convention-context";
import type { EntityTypeAddedConvention } from "./convention-events";

/**
 * Links entity types along their class hierarchy. The nearest mapped
 * ancestor class becomes the base type, whichever of the two was added first.
 */
export class InheritanceDiscoveryConvention implements EntityTypeAddedConvention {
  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    const entityType = entityTypeBuilder.metadata;
    const clrType = entityType.clrType;
    if (!clrType) {
      return;
    }

    const model = entityType.model;
    const baseType = findMappedBaseType(model, clrType);
    if (baseType && entityType.baseType !== baseType) {
      entityTypeBuilder.hasBaseType(baseType, ConfigurationSource.Convention);
    }

    for (const other of model.getEntityTypes()) {
      if (other === entityType || !other.clrType || other.baseType === entityType) {
        continue;
      }
      if (findMappedBaseType(model, other.clrType) === entityType) {
        other.builder?.hasBaseType(entityType, ConfigurationSource.Convention);
      }
    }
  }
}

function findMappedBaseType(model: Model, clrType: Function): EntityType | undefined {
  for (
    let current: unknown = Object.getPrototypeOf(clrType);
    typeof current === "function" && current !== Function.prototype;
    current = Object.getPrototypeOf(current)
  ) {
    const entityType = model.findEntityType(current);
    if (entityType) {
      return entityType;
    }
  }
  return undefined;
}
