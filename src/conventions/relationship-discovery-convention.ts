import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { Navigation } from "../metadata/navigation";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { TypeInspector } from "../reflection";
import type { MemberInfo } from "../types";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeAddedConvention,
  EntityTypeBaseTypeChangedConvention,
  EntityTypeMemberIgnoredConvention,
} from "./convention-events";
import type { InversePropertyAttributeConvention } from "./inverse-property-attribute-convention";
import { getTargetEntityTypeBuilder } from "./navigation-attribute-convention";

/**
 * Builds one relationship per navigation member of a type.
 *
 * The inverse is the single member on the target that points back, provided
 * the pairing is unique in both directions and no `@InverseProperty`
 * configuration claims either side. A target marked `@Owned` becomes owned
 * by the type instead. Navigations discovered without an inverse are paired
 * later when ignoring a member leaves a unique candidate.
 *
 * @example
 * ```typescript
 * class Blog {
 *   @Navigation(() => Post, { collection: true })
 *   posts!: Related<Post>[];
 * }
 * class Post {
 *   @Navigation(() => Blog)
 *   blog!: Related<Blog>;
 * }
 * // Blog.posts and Post.blog become the two ends of one foreign key
 * ```
 */
export class RelationshipDiscoveryConvention
  implements
    EntityTypeAddedConvention,
    EntityTypeBaseTypeChangedConvention,
    EntityTypeMemberIgnoredConvention
{
  constructor(
    private readonly inspector: TypeInspector,
    private readonly inverseProperty: InversePropertyAttributeConvention
  ) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    this.discoverRelationships(entityTypeBuilder);
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    _context: ConventionContext<EntityType | undefined>
  ): void {
    if (entityTypeBuilder.metadata.baseType !== newBaseType) {
      return;
    }
    this.discoverRelationships(entityTypeBuilder);
  }

  processEntityTypeMemberIgnored(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _name: string,
    _context: ConventionContext<string>
  ): void {
    // An ignored member can leave another one as the only candidate inverse
    this.discoverRelationships(entityTypeBuilder);
    for (const foreignKey of entityTypeBuilder.metadata.getReferencingForeignKeys()) {
      const dependentBuilder = foreignKey.declaringEntityType.builder;
      if (dependentBuilder && dependentBuilder !== entityTypeBuilder) {
        this.discoverRelationships(dependentBuilder);
      }
    }
  }

  private discoverRelationships(entityTypeBuilder: InternalEntityTypeBuilder): void {
    const entityType = entityTypeBuilder.metadata;
    const clrType = entityType.clrType;
    if (!clrType) {
      return;
    }

    for (const member of this.getNavigationMembers(entityType)) {
      if (!entityTypeBuilder.isInModel) {
        return;
      }
      const targetType = this.inspector.findCandidateNavigationType(member);
      if (targetType) {
        this.discoverRelationship(entityTypeBuilder, member, targetType);
      }
    }
  }

  private discoverRelationship(
    entityTypeBuilder: InternalEntityTypeBuilder,
    member: MemberInfo,
    targetType: Function
  ): void {
    const entityType = entityTypeBuilder.metadata;
    const modelBuilder = entityTypeBuilder.modelBuilder;
    if (
      isSettled(entityType.findNavigation(member.name)) ||
      this.inspector.getAttribute(member, "inverseProperty") !== undefined ||
      this.inverseProperty.isClaimedInverse(entityType, member) ||
      !entityTypeBuilder.canAddNavigation(member.name, ConfigurationSource.Convention) ||
      modelBuilder.isIgnored(targetType, ConfigurationSource.Convention)
    ) {
      return;
    }

    const existingTarget = modelBuilder.metadata.findEntityType(targetType);
    if (existingTarget && this.inverseProperty.isAmbiguous(entityType, member, existingTarget)) {
      return;
    }

    const targetBuilder = getTargetEntityTypeBuilder(entityTypeBuilder, targetType, ConfigurationSource.Convention);
    // Adding the target runs its own discovery, which may already have paired or claimed this member
    const existing = entityType.findNavigation(member.name);
    if (
      !targetBuilder ||
      !entityTypeBuilder.isInModel ||
      isSettled(existing) ||
      this.inverseProperty.isClaimedInverse(entityType, member)
    ) {
      return;
    }

    const targetEntityType = targetBuilder.metadata;
    if (targetEntityType.isKeyless) {
      return;
    }

    const inverse = this.findInverse(entityType, member, targetEntityType);
    if (existing && !inverse) {
      return;
    }
    if (this.inspector.getTypeAttribute(targetType, "owned")) {
      entityTypeBuilder.hasOwnership(targetEntityType, member, inverse, ConfigurationSource.Convention);
      return;
    }

    entityTypeBuilder.hasRelationship(targetEntityType, member, inverse, ConfigurationSource.Convention);
  }

  /**
   * Navigation members of the type that no mapped base type declares.
   */
  private getNavigationMembers(entityType: EntityType): MemberInfo[] {
    const clrType = entityType.clrType;
    if (!clrType) {
      return [];
    }
    const baseClrType = entityType.baseType?.clrType;
    return this.inspector
      .getMembers(clrType)
      .filter(
        (member) =>
          this.inspector.findCandidateNavigationType(member) !== undefined &&
          !(baseClrType && this.inspector.isAssignableFrom(member.declaringType, baseClrType)) &&
          !entityType.builder?.isIgnored(member.name, ConfigurationSource.Convention)
      );
  }

  private findInverse(
    entityType: EntityType,
    member: MemberInfo,
    targetEntityType: EntityType
  ): MemberInfo | undefined {
    const clrType = entityType.clrType;
    const targetClrType = targetEntityType.clrType;
    if (!clrType || !targetClrType) {
      return undefined;
    }

    const candidates = this.getUnclaimedNavigations(targetEntityType, clrType).filter((m) => m !== member);
    if (candidates.length !== 1) {
      return undefined;
    }

    const inverse = candidates[0];
    const existing = targetEntityType.findNavigation(inverse.name);
    if (existing && (existing.findInverse() || !existing.targetEntityType.isSameHierarchy(entityType))) {
      return undefined;
    }

    // The pairing must be unique from this side as well
    const reverse = this.getUnclaimedNavigations(entityType, targetClrType).filter((m) => m !== inverse);
    if (reverse.length !== 1 || reverse[0] !== member) {
      return undefined;
    }

    if (this.inspector.isCollection(member) && this.inspector.isCollection(inverse)) {
      return undefined;
    }
    return inverse;
  }

  /**
   * Navigation members of `entityType` pointing at `targetClrType` (or one of
   * its bases) that no attribute configuration has taken.
   */
  private getUnclaimedNavigations(entityType: EntityType, targetClrType: Function): MemberInfo[] {
    const entityTypeBuilder = entityType.builder;
    if (!entityTypeBuilder) {
      return [];
    }

    return this.getNavigationMembers(entityType).filter((m) => {
      const target = this.inspector.findCandidateNavigationType(m);
      return (
        target !== undefined &&
        this.inspector.isAssignableFrom(target, targetClrType) &&
        this.inspector.getAttribute(m, "inverseProperty") === undefined &&
        !this.inverseProperty.isClaimedInverse(entityType, m)
      );
    });
  }
}

/**
 * A navigation discovery leaves alone: paired, or configured above Convention.
 */
function isSettled(navigation: Navigation | undefined): boolean {
  return (
    navigation !== undefined &&
    (navigation.findInverse() !== undefined || navigation.configurationSource !== ConfigurationSource.Convention)
  );
}
