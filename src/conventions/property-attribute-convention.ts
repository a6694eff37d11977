import type { InternalPropertyBuilder } from "../metadata/internal-property-builder";
import type { TypeInspector } from "../reflection";
import type { MemberAttributes, MemberInfo } from "../types";
import type { ConventionContext } from "./convention-context";
import type { PropertyAddedConvention } from "./convention-events";

/**
 * Base for conventions driven by one member attribute on a scalar property.
 *
 * @example
 * ```typescript
 * class MaxLengthConvention extends PropertyAttributeConvention<"column"> {
 *   constructor(inspector: TypeInspector) {
 *     super(inspector, "column");
 *   }
 *
 *   protected processPropertyWithAttribute(builder, column) {
 *     builder.hasAnnotation("ColumnName", column.name, ConfigurationSource.DataAnnotation);
 *   }
 * }
 * ```
 */
export abstract class PropertyAttributeConvention<K extends keyof MemberAttributes>
  implements PropertyAddedConvention
{
  constructor(
    protected readonly inspector: TypeInspector,
    private readonly attributeKind: K
  ) {}

  processPropertyAdded(
    propertyBuilder: InternalPropertyBuilder,
    context: ConventionContext<InternalPropertyBuilder>
  ): void {
    const member = propertyBuilder.metadata.memberInfo;
    if (!member) {
      return;
    }

    const attribute = this.inspector.getAttribute(member, this.attributeKind);
    if (attribute === undefined) {
      return;
    }

    this.processPropertyWithAttribute(propertyBuilder, attribute, member, context);
  }

  protected abstract processPropertyWithAttribute(
    propertyBuilder: InternalPropertyBuilder,
    attribute: MemberAttributes[K],
    member: MemberInfo,
    context: ConventionContext<InternalPropertyBuilder>
  ): void;
}
