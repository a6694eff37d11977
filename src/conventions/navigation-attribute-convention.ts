import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalRelationshipBuilder } from "../metadata/internal-relationship-builder";
import type { Navigation } from "../metadata/navigation";
import type { TypeInspector } from "../reflection";
import type { MemberAttributes, MemberInfo } from "../types";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeAddedConvention,
  EntityTypeBaseTypeChangedConvention,
  EntityTypeMemberIgnoredConvention,
  NavigationAddedConvention,
} from "./convention-events";

export interface AttributedNavigation<K extends keyof MemberAttributes> {
  member: MemberInfo;
  targetType: Function;
  attribute: MemberAttributes[K];
}

/**
 * Find the builder of a navigation's target type. With a configuration source
 * the target is added (or promoted) when missing; without one only an
 * existing target is returned.
 */
export function getTargetEntityTypeBuilder(
  entityTypeBuilder: InternalEntityTypeBuilder,
  targetType: Function,
  configurationSource: ConfigurationSource | undefined
): InternalEntityTypeBuilder | undefined {
  const modelBuilder = entityTypeBuilder.modelBuilder;
  if (configurationSource === undefined) {
    return modelBuilder.metadata.findEntityType(targetType)?.builder;
  }
  if (modelBuilder.isIgnored(targetType, configurationSource)) {
    return undefined;
  }
  return modelBuilder.entity(targetType, configurationSource);
}

/**
 * Base for conventions driven by an attribute on navigation members.
 *
 * Subclasses override the hooks they need; each hook only sees navigation
 * members that carry attribute `K`.
 */
export abstract class NavigationAttributeConvention<K extends keyof MemberAttributes>
  implements
    EntityTypeAddedConvention,
    EntityTypeBaseTypeChangedConvention,
    NavigationAddedConvention,
    EntityTypeMemberIgnoredConvention
{
  constructor(
    protected readonly inspector: TypeInspector,
    private readonly attributeKind: K
  ) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (!clrType) {
      return;
    }

    for (const navigation of this.getNavigationsWithAttribute(clrType)) {
      this.processEntityTypeAddedWithAttribute(entityTypeBuilder, navigation, context);
      if (!entityTypeBuilder.isInModel) {
        return;
      }
    }
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    newBaseType: EntityType | undefined,
    oldBaseType: EntityType | undefined,
    context: ConventionContext<EntityType | undefined>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (!clrType || entityTypeBuilder.metadata.baseType !== newBaseType) {
      return;
    }

    for (const navigation of this.getNavigationsWithAttribute(clrType)) {
      this.processBaseTypeChangedWithAttribute(entityTypeBuilder, newBaseType, oldBaseType, navigation, context);
      if (!entityTypeBuilder.isInModel) {
        return;
      }
    }
  }

  processNavigationAdded(
    relationshipBuilder: InternalRelationshipBuilder,
    navigation: Navigation,
    context: ConventionContext<Navigation>
  ): void {
    const member = navigation.memberInfo;
    const attribute = member && this.inspector.getAttribute(member, this.attributeKind);
    if (!member || attribute === undefined) {
      return;
    }

    this.processNavigationAddedWithAttribute(relationshipBuilder, navigation, attribute, context);
  }

  processEntityTypeMemberIgnored(
    entityTypeBuilder: InternalEntityTypeBuilder,
    name: string,
    context: ConventionContext<string>
  ): void {
    const clrType = entityTypeBuilder.metadata.clrType;
    if (!clrType) {
      return;
    }

    const navigation = this.getNavigationsWithAttribute(clrType).find((n) => n.member.name === name);
    if (navigation) {
      this.processMemberIgnoredWithAttribute(entityTypeBuilder, navigation, context);
    }
  }

  protected getNavigationsWithAttribute(clrType: Function): AttributedNavigation<K>[] {
    const navigations: AttributedNavigation<K>[] = [];
    for (const member of this.inspector.getMembers(clrType)) {
      const targetType = this.inspector.findCandidateNavigationType(member);
      const attribute = targetType && this.inspector.getAttribute(member, this.attributeKind);
      if (targetType && attribute !== undefined) {
        navigations.push({ member, targetType, attribute });
      }
    }
    return navigations;
  }

  protected processEntityTypeAddedWithAttribute(
    _entityTypeBuilder: InternalEntityTypeBuilder,
    _navigation: AttributedNavigation<K>,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {}

  protected processBaseTypeChangedWithAttribute(
    _entityTypeBuilder: InternalEntityTypeBuilder,
    _newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    _navigation: AttributedNavigation<K>,
    _context: ConventionContext<EntityType | undefined>
  ): void {}

  protected processNavigationAddedWithAttribute(
    _relationshipBuilder: InternalRelationshipBuilder,
    _navigation: Navigation,
    _attribute: MemberAttributes[K],
    _context: ConventionContext<Navigation>
  ): void {}

  protected processMemberIgnoredWithAttribute(
    _entityTypeBuilder: InternalEntityTypeBuilder,
    _navigation: AttributedNavigation<K>,
    _context: ConventionContext<string>
  ): void {}
}
