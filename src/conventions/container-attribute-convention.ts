import { ConfigurationSource } from "../metadata/configuration-source";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { TypeInspector } from "../reflection";
import { AnnotationNames } from "../types";
import type { ConventionContext } from "./convention-context";
import type { EntityTypeAddedConvention } from "./convention-events";

/**
 * Copies `@Container(name)` onto the container-name annotation.
 */
export class ContainerAttributeConvention implements EntityTypeAddedConvention {
  constructor(private readonly inspector: TypeInspector) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    const container = clrType && this.inspector.getTypeAttribute(clrType, "container");
    if (container) {
      entityTypeBuilder.hasAnnotation(AnnotationNames.ContainerName, container, ConfigurationSource.DataAnnotation);
    }
  }
}
