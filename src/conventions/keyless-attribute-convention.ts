import { ConfigurationSource } from "../metadata/configuration-source";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { TypeInspector } from "../reflection";
import type { ConventionContext } from "./convention-context";
import type { EntityTypeAddedConvention } from "./convention-events";

export class KeylessAttributeConvention implements EntityTypeAddedConvention {
  constructor(private readonly inspector: TypeInspector) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (clrType && this.inspector.getTypeAttribute(clrType, "keyless")) {
      entityTypeBuilder.isKeyless(true, ConfigurationSource.DataAnnotation);
    }
  }
}
