import { ConfigurationSource } from "../metadata/configuration-source";
import type { InternalPropertyBuilder } from "../metadata/internal-property-builder";
import type { TypeInspector } from "../reflection";
import type { ValueGenerated } from "../types";
import { PropertyAttributeConvention } from "./property-attribute-convention";

export class DatabaseGeneratedAttributeConvention extends PropertyAttributeConvention<"databaseGenerated"> {
  constructor(inspector: TypeInspector) {
    super(inspector, "databaseGenerated");
  }

  protected processPropertyWithAttribute(
    propertyBuilder: InternalPropertyBuilder,
    valueGenerated: ValueGenerated
  ): void {
    propertyBuilder.valueGenerated(valueGenerated, ConfigurationSource.DataAnnotation);
  }
}
