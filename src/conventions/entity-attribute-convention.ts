import { ConfigurationSource } from "../metadata/configuration-source";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { TypeInspector } from "../reflection";
import { AnnotationNames } from "../types";
import type { ConventionContext } from "./convention-context";
import type { EntityTypeAddedConvention } from "./convention-events";

/**
 * Pins `@Entity` classes at DataAnnotation and records their table name.
 */
export class EntityAttributeConvention implements EntityTypeAddedConvention {
  constructor(private readonly inspector: TypeInspector) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (!clrType) {
      return;
    }

    const tableName = this.inspector.getTypeAttribute(clrType, "entity");
    if (tableName === undefined) {
      return;
    }

    const builder = entityTypeBuilder.modelBuilder.entity(clrType, ConfigurationSource.DataAnnotation);
    if (!builder) {
      context.stopProcessing();
      return;
    }
    builder.hasAnnotation(AnnotationNames.TableName, tableName, ConfigurationSource.DataAnnotation);
  }
}
