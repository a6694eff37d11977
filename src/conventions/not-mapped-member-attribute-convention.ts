import { ConfigurationSource } from "../metadata/configuration-source";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { TypeInspector } from "../reflection";
import type { ConventionContext } from "./convention-context";
import type { EntityTypeAddedConvention } from "./convention-events";

/**
 * Ignores `@NotMapped()` members before discovery conventions see them.
 */
export class NotMappedMemberAttributeConvention implements EntityTypeAddedConvention {
  constructor(private readonly inspector: TypeInspector) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (!clrType) {
      return;
    }

    for (const member of this.inspector.getMembers(clrType)) {
      if (this.inspector.getAttribute(member, "notMapped")) {
        entityTypeBuilder.ignore(member.name, ConfigurationSource.DataAnnotation);
      }
    }
  }
}
