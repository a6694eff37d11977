import { ConfigurationSource } from "../metadata/configuration-source";
import type { InternalModelBuilder } from "../metadata/internal-model-builder";
import type { InternalPropertyBuilder } from "../metadata/internal-property-builder";
import type { Property } from "../metadata/property";
import type { TypeInspector } from "../reflection";
import { ModelConfigurationError, ModelErrorCode } from "../errors";
import type { ConventionContext } from "./convention-context";
import type { ModelFinalizedConvention } from "./convention-events";
import { PropertyAttributeConvention } from "./property-attribute-convention";

/**
 * Builds the primary key from `@Key()` members. Composite keys follow
 * member declaration order, base class members first.
 */
export class KeyAttributeConvention
  extends PropertyAttributeConvention<"key">
  implements ModelFinalizedConvention
{
  constructor(inspector: TypeInspector) {
    super(inspector, "key");
  }

  protected processPropertyWithAttribute(propertyBuilder: InternalPropertyBuilder): void {
    const entityType = propertyBuilder.metadata.declaringEntityType;
    const entityTypeBuilder = entityType.builder;
    const clrType = entityType.clrType;
    if (!entityTypeBuilder || !clrType || entityType.baseType || entityType.isKeyless) {
      return;
    }

    const keyProperties: Property[] = [];
    for (const member of this.inspector.getMembers(clrType)) {
      if (!this.inspector.getAttribute(member, "key")) {
        continue;
      }
      const property = entityType.findProperty(member.name);
      if (property) {
        keyProperties.push(property);
      }
    }

    entityTypeBuilder.primaryKey(keyProperties, ConfigurationSource.DataAnnotation);
  }

  processModelFinalized(
    modelBuilder: InternalModelBuilder,
    _context: ConventionContext<InternalModelBuilder>
  ): void {
    for (const entityType of modelBuilder.metadata.getEntityTypes()) {
      if (!entityType.baseType) {
        continue;
      }
      for (const property of entityType.getDeclaredProperties()) {
        if (property.memberInfo && this.inspector.getAttribute(property.memberInfo, "key")) {
          throw new ModelConfigurationError(
            `'${entityType.displayName()}.${property.name}' is marked as a key, but '${entityType.displayName()}' is a derived type. Keys can only be declared on the root type '${entityType.getRootType().displayName()}'.`,
            ModelErrorCode.KEY_ON_DERIVED_TYPE,
            { entityType: entityType.name, property: property.name }
          );
        }
      }
    }
  }
}
