import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalModelBuilder } from "../metadata/internal-model-builder";
import type { InternalRelationshipBuilder } from "../metadata/internal-relationship-builder";
import type { Navigation } from "../metadata/navigation";
import { ModelConfigurationError, ModelErrorCode } from "../errors";
import { ModelEventId } from "../diagnostics";
import type { ModelDiagnostics } from "../diagnostics";
import { isSameMember } from "../reflection";
import type { TypeInspector } from "../reflection";
import type { MemberInfo } from "../types";
import type { ConventionContext } from "./convention-context";
import type { EntityTypeRemovedConvention, ModelFinalizedConvention } from "./convention-events";
import {
  NavigationAttributeConvention,
  getTargetEntityTypeBuilder,
} from "./navigation-attribute-convention";
import type { AttributedNavigation } from "./navigation-attribute-convention";

interface ReferencingNavigation {
  member: MemberInfo;
  entityType: EntityType;
}

/** Per target type: inverse member → navigations naming it */
type InverseNavigations = Map<MemberInfo, ReferencingNavigation[]>;

/**
 * Pairs navigations through `@InverseProperty(name)`.
 *
 * Every navigation naming an inverse is recorded against the target type.
 * When unrelated navigations name the same inverse, all relationships built
 * from them are taken apart until the ambiguity is resolved by ignoring
 * members. What is still ambiguous at finalization is logged, not thrown.
 *
 * @example
 * ```typescript
 * class Post {
 *   @Navigation(() => User)
 *   @InverseProperty("authoredPosts")
 *   author!: Related<User>;
 * }
 * ```
 */
export class InversePropertyAttributeConvention
  extends NavigationAttributeConvention<"inverseProperty">
  implements ModelFinalizedConvention, EntityTypeRemovedConvention
{
  private readonly inverseNavigations = new Map<EntityType, InverseNavigations>();

  constructor(
    inspector: TypeInspector,
    private readonly diagnostics: ModelDiagnostics
  ) {
    super(inspector, "inverseProperty");
  }

  protected processEntityTypeAddedWithAttribute(
    entityTypeBuilder: InternalEntityTypeBuilder,
    navigation: AttributedNavigation<"inverseProperty">
  ): void {
    if (!entityTypeBuilder.canAddNavigation(navigation.member.name, ConfigurationSource.DataAnnotation)) {
      return;
    }

    const targetBuilder = getTargetEntityTypeBuilder(
      entityTypeBuilder,
      navigation.targetType,
      ConfigurationSource.DataAnnotation
    );
    if (!targetBuilder || !entityTypeBuilder.isInModel) {
      return;
    }

    this.configureInverseNavigation(entityTypeBuilder, navigation.member, targetBuilder, navigation.attribute);
  }

  protected processNavigationAddedWithAttribute(
    relationshipBuilder: InternalRelationshipBuilder,
    navigation: Navigation,
    inverseName: string,
    context: ConventionContext<Navigation>
  ): void {
    const foreignKey = relationshipBuilder.metadata;
    if (foreignKey.declaringEntityType.isOwned() || foreignKey.principalEntityType.isOwned()) {
      return;
    }

    const sourceBuilder = navigation.declaringEntityType.builder;
    const targetBuilder = navigation.targetEntityType.builder;
    const member = navigation.memberInfo;
    if (!sourceBuilder || !targetBuilder || !member) {
      return;
    }

    const relationship = this.configureInverseNavigation(sourceBuilder, member, targetBuilder, inverseName);
    if (relationship !== relationshipBuilder) {
      const replacement = navigation.isDependentToPrincipal
        ? relationship?.metadata.dependentToPrincipal
        : relationship?.metadata.principalToDependent;
      if (replacement !== navigation) {
        context.stopProcessing(replacement);
      }
    }
  }

  protected processBaseTypeChangedWithAttribute(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    navigation: AttributedNavigation<"inverseProperty">,
    context: ConventionContext<EntityType | undefined>
  ): void {
    const entityType = entityTypeBuilder.metadata;
    if (navigation.member.declaringType === entityType.clrType) {
      return;
    }

    if (!entityType.baseType) {
      this.processEntityTypeAddedWithAttribute(entityTypeBuilder, navigation);
      return;
    }

    const target = entityType.model.findEntityType(navigation.targetType);
    if (target) {
      this.removeInverseNavigation(entityType, navigation.member, target);
    }
  }

  protected processMemberIgnoredWithAttribute(
    entityTypeBuilder: InternalEntityTypeBuilder,
    navigation: AttributedNavigation<"inverseProperty">
  ): void {
    const target = getTargetEntityTypeBuilder(entityTypeBuilder, navigation.targetType, undefined);
    if (target) {
      this.removeInverseNavigation(entityTypeBuilder.metadata, navigation.member, target.metadata);
    }
  }

  processEntityTypeRemoved(
    _modelBuilder: InternalModelBuilder,
    entityType: EntityType,
    _context: ConventionContext<EntityType>
  ): void {
    this.inverseNavigations.delete(entityType);
    for (const inverseNavigations of this.inverseNavigations.values()) {
      for (const [inverse, referencing] of inverseNavigations) {
        const remaining = referencing.filter((r) => r.entityType !== entityType);
        if (remaining.length === 0) {
          inverseNavigations.delete(inverse);
        } else {
          inverseNavigations.set(inverse, remaining);
        }
      }
    }
  }

  processModelFinalized(
    _modelBuilder: InternalModelBuilder,
    _context: ConventionContext<InternalModelBuilder>
  ): void {
    for (const [entityType, inverseNavigations] of this.inverseNavigations) {
      if (!entityType.isInModel) {
        continue;
      }
      for (const [inverse, referencing] of inverseNavigations) {
        for (const reference of [...referencing]) {
          const ambiguous = this.findAmbiguousInverse(reference.member, reference.entityType, referencing);
          if (ambiguous) {
            this.diagnostics.warning(
              ModelEventId.MultipleInversePropertiesSameTargetWarning,
              `Navigations ${reference.entityType.displayName()}.${reference.member.name} and ${ambiguous.entityType.displayName()}.${ambiguous.member.name} both name '${entityType.displayName()}.${inverse.name}' as their inverse; neither relationship was configured.`,
              {
                entityType: entityType.name,
                inverseNavigation: inverse.name,
                navigations: [
                  `${reference.entityType.name}.${reference.member.name}`,
                  `${ambiguous.entityType.name}.${ambiguous.member.name}`,
                ],
              }
            );
            break;
          }
        }
      }
    }
    this.inverseNavigations.clear();
  }

  /**
   * True when `navigation` on `entityType` names an inverse on
   * `targetEntityType` that another unrelated navigation also names.
   */
  isAmbiguous(entityType: EntityType, navigation: MemberInfo, targetEntityType: EntityType): boolean {
    const clrType = entityType.clrType;
    const inverseNavigations = this.inverseNavigations.get(targetEntityType);
    if (!clrType || !inverseNavigations) {
      return false;
    }

    for (const [inverse, referencing] of inverseNavigations) {
      const inverseTarget = this.inspector.findCandidateNavigationType(inverse);
      if (
        inverseTarget &&
        this.inspector.isAssignableFrom(inverseTarget, clrType) &&
        this.findAmbiguousInverse(navigation, entityType, referencing)
      ) {
        return true;
      }
    }
    return false;
  }

  /**
   * True when some navigation names `member` of `entityType` as its inverse.
   */
  isClaimedInverse(entityType: EntityType, member: MemberInfo): boolean {
    for (const type of entityType.getTypesInHierarchyUp()) {
      const inverseNavigations = this.inverseNavigations.get(type);
      if (!inverseNavigations) {
        continue;
      }
      for (const [inverse, referencing] of inverseNavigations) {
        if (referencing.length > 0 && isSameMember(this.inspector, inverse, member)) {
          return true;
        }
      }
    }
    return false;
  }

  private configureInverseNavigation(
    entityTypeBuilder: InternalEntityTypeBuilder,
    navigationMember: MemberInfo,
    targetBuilder: InternalEntityTypeBuilder,
    inverseName: string
  ): InternalRelationshipBuilder | undefined {
    const entityType = entityTypeBuilder.metadata;
    const targetEntityType = targetBuilder.metadata;
    const targetClrType = targetEntityType.clrType;
    const clrType = entityType.clrType;

    const inverseMember = targetClrType && this.inspector.findMember(targetClrType, inverseName);
    const inverseTarget = inverseMember && this.inspector.findCandidateNavigationType(inverseMember);
    if (!inverseMember || !inverseTarget || !clrType || !this.inspector.isAssignableFrom(inverseTarget, clrType)) {
      throw new ModelConfigurationError(
        `The inverse property '${inverseName}' named by '${entityType.displayName()}.${navigationMember.name}' is not a valid navigation to '${entityType.displayName()}' on '${targetEntityType.displayName()}'.`,
        ModelErrorCode.INVALID_NAVIGATION_WITH_INVERSE_PROPERTY,
        { entityType: entityType.name, navigation: navigationMember.name, inverseProperty: inverseName }
      );
    }

    if (inverseMember === navigationMember) {
      throw new ModelConfigurationError(
        `'${entityType.displayName()}.${navigationMember.name}' names itself as its inverse property.`,
        ModelErrorCode.SELF_REFERENCING_NAVIGATION_WITH_INVERSE_PROPERTY,
        { entityType: entityType.name, navigation: navigationMember.name }
      );
    }

    const inverseOfInverse = this.inspector.getAttribute(inverseMember, "inverseProperty");
    if (inverseOfInverse !== undefined && inverseOfInverse !== navigationMember.name) {
      throw new ModelConfigurationError(
        `'${entityType.displayName()}.${navigationMember.name}' names '${targetEntityType.displayName()}.${inverseMember.name}' as its inverse, but that navigation names '${inverseOfInverse}'.`,
        ModelErrorCode.INVERSE_PROPERTY_MISMATCH,
        {
          entityType: entityType.name,
          navigation: navigationMember.name,
          inverseEntityType: targetEntityType.name,
          inverseNavigation: inverseMember.name,
        }
      );
    }

    const referencing = this.addInverseNavigation(entityType, navigationMember, targetEntityType, inverseMember);
    const ambiguous = this.findAmbiguousInverse(navigationMember, entityType, referencing);
    if (ambiguous) {
      const existingInverse = targetEntityType.findNavigation(inverseMember.name)?.findInverse();
      if (
        existingInverse?.memberInfo &&
        this.findAmbiguousInverse(existingInverse.memberInfo, existingInverse.declaringEntityType, referencing)
      ) {
        this.removeNavigation(existingInverse);
      }

      const existingNavigation = entityType.findNavigation(navigationMember.name);
      if (existingNavigation) {
        this.removeNavigation(existingNavigation);
      }

      const ambiguousNavigation = findActualEntityType(ambiguous.entityType)?.findNavigation(ambiguous.member.name);
      if (ambiguousNavigation) {
        this.removeNavigation(ambiguousNavigation);
      }

      return entityType.findNavigation(navigationMember.name)?.foreignKey.builder;
    }

    const ownership = entityType.findOwnership();
    const ownerNavigation = ownership?.principalToDependent?.memberInfo;
    if (
      ownership &&
      ownership.principalEntityType === targetEntityType &&
      (!ownerNavigation || !isSameMember(this.inspector, ownerNavigation, inverseMember))
    ) {
      this.diagnostics.warning(
        ModelEventId.NonOwnershipInverseNavigationWarning,
        `'${entityType.displayName()}.${navigationMember.name}' names '${targetEntityType.displayName()}.${inverseMember.name}' as its inverse, but '${entityType.displayName()}' is owned through '${ownerNavigation?.name ?? ""}'. The inverse property is ignored.`,
        {
          entityType: entityType.name,
          navigation: navigationMember.name,
          inverseNavigation: inverseMember.name,
          ownershipNavigation: ownerNavigation?.name,
        }
      );
      return undefined;
    }

    if (this.inspector.getTypeAttribute(clrType, "owned") && !isInOwnershipPath(entityType, targetEntityType)) {
      return targetBuilder.hasOwnership(
        entityType,
        inverseMember,
        navigationMember,
        ConfigurationSource.DataAnnotation
      );
    }

    return targetBuilder.hasRelationship(
      entityType,
      inverseMember,
      navigationMember,
      ConfigurationSource.DataAnnotation
    );
  }

  /**
   * Take a navigation out: drop its foreign key, or only the navigation
   * when the key is an ownership or cannot be removed.
   */
  private removeNavigation(navigation: Navigation): void {
    const foreignKey = navigation.foreignKey;
    const dependentBuilder = foreignKey.declaringEntityType.builder;
    if (
      foreignKey.isOwnership ||
      !dependentBuilder?.hasNoRelationship(foreignKey, ConfigurationSource.DataAnnotation)
    ) {
      foreignKey.builder?.hasNavigation(undefined, navigation.isDependentToPrincipal, ConfigurationSource.DataAnnotation);
    }
  }

  private addInverseNavigation(
    entityType: EntityType,
    navigation: MemberInfo,
    targetEntityType: EntityType,
    inverse: MemberInfo
  ): ReferencingNavigation[] {
    let inverseNavigations = this.inverseNavigations.get(targetEntityType);
    if (!inverseNavigations) {
      inverseNavigations = new Map();
      this.inverseNavigations.set(targetEntityType, inverseNavigations);
    }

    let referencing = inverseNavigations.get(inverse);
    if (!referencing) {
      referencing = [];
      inverseNavigations.set(inverse, referencing);
    }

    const recorded = referencing.some(
      (r) =>
        isSameMember(this.inspector, r.member, navigation) &&
        r.entityType.clrType === entityType.clrType &&
        findActualEntityType(r.entityType) === entityType
    );
    if (!recorded) {
      referencing.push({ member: navigation, entityType });
    }
    return referencing;
  }

  private removeInverseNavigation(entityType: EntityType, navigation: MemberInfo, targetEntityType: EntityType): void {
    const inverseNavigations = this.inverseNavigations.get(targetEntityType);
    if (!inverseNavigations) {
      return;
    }

    for (const [inverse, referencing] of inverseNavigations) {
      const index = referencing.findIndex(
        (r) =>
          isSameMember(this.inspector, r.member, navigation) &&
          r.entityType.clrType === entityType.clrType &&
          findActualEntityType(r.entityType) === entityType
      );
      if (index < 0) {
        continue;
      }

      referencing.splice(index, 1);
      if (referencing.length === 0) {
        inverseNavigations.delete(inverse);
      } else if (referencing.length === 1) {
        const remaining = referencing[0];
        const otherEntityType = findActualEntityType(remaining.entityType);
        if (otherEntityType) {
          targetEntityType.builder?.hasRelationship(
            otherEntityType,
            inverse,
            remaining.member,
            ConfigurationSource.DataAnnotation
          );
        }
      }
      return;
    }
  }

  /**
   * First recorded navigation that conflicts with `navigation`. Entries whose
   * member has since been ignored are dropped on the way.
   */
  private findAmbiguousInverse(
    navigation: MemberInfo,
    entityType: EntityType,
    referencing: ReferencingNavigation[]
  ): ReferencingNavigation | undefined {
    if (referencing.length === 1) {
      return undefined;
    }

    let ambiguous: ReferencingNavigation | undefined;
    const stale: ReferencingNavigation[] = [];
    for (const reference of referencing) {
      const actual = findActualEntityType(reference.entityType);
      if (!actual?.builder || actual.builder.isIgnored(reference.member.name, ConfigurationSource.DataAnnotation)) {
        stale.push(reference);
        continue;
      }
      if (!isSameMember(this.inspector, reference.member, navigation) || !entityType.isSameHierarchy(actual)) {
        ambiguous = reference;
        break;
      }
    }

    for (const reference of stale) {
      referencing.splice(referencing.indexOf(reference), 1);
    }
    return ambiguous;
  }
}

/**
 * The live entity type for a recorded one; a type removed and added again
 * is found again by name.
 */
function findActualEntityType(entityType: EntityType): EntityType | undefined {
  if (entityType.isInModel) {
    return entityType;
  }
  return entityType.model.findEntityType(entityType.clrType ?? entityType.name);
}

function isInOwnershipPath(entityType: EntityType, targetEntityType: EntityType): boolean {
  const visited = new Set<EntityType>();
  for (
    let owner = entityType.findOwnership()?.principalEntityType;
    owner && !visited.has(owner);
    owner = owner.findOwnership()?.principalEntityType
  ) {
    if (owner === targetEntityType) {
      return true;
    }
    visited.add(owner);
  }
  return false;
}
