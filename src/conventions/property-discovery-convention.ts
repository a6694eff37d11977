import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { TypeInspector } from "../reflection";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeAddedConvention,
  EntityTypeBaseTypeChangedConvention,
} from "./convention-events";

/**
 * Maps every member with a column type to a property.
 *
 * Runs again when the base type changes: members that were inherited from a
 * removed base must become declared properties.
 */
export class PropertyDiscoveryConvention
  implements EntityTypeAddedConvention, EntityTypeBaseTypeChangedConvention
{
  constructor(private readonly inspector: TypeInspector) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    this.discoverProperties(entityTypeBuilder);
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    _context: ConventionContext<EntityType | undefined>
  ): void {
    if (entityTypeBuilder.metadata.baseType === newBaseType) {
      this.discoverProperties(entityTypeBuilder);
    }
  }

  private discoverProperties(entityTypeBuilder: InternalEntityTypeBuilder): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (!clrType) {
      return;
    }

    for (const member of this.inspector.getMembers(clrType)) {
      const columnType = this.inspector.findColumnType(member);
      if (!columnType) {
        continue;
      }
      entityTypeBuilder.property(member.name, member.type ?? Object, ConfigurationSource.Convention, {
        memberInfo: member,
        columnType,
      });
      if (!entityTypeBuilder.isInModel) {
        return;
      }
    }
  }
}
