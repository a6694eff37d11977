import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import { formatProperties } from "../metadata/key";
import type { InternalModelBuilder } from "../metadata/internal-model-builder";
import type { InternalRelationshipBuilder } from "../metadata/internal-relationship-builder";
import { ModelConfigurationError, ModelErrorCode } from "../errors";
import { ModelEventId } from "../diagnostics";
import type { ModelDiagnostics } from "../diagnostics";
import type { TypeInspector } from "../reflection";
import type { MemberInfo } from "../types";
import type { ConventionContext } from "./convention-context";
import type { ForeignKeyAddedConvention, ModelFinalizedConvention } from "./convention-events";

/**
 * Pins foreign key properties named through `@ForeignKey`.
 *
 * The attribute goes either on a scalar member, naming the navigation it
 * backs, or on a navigation, naming the backing properties (comma
 * separated for composite keys). When the two ends of a relationship
 * disagree, the relationship is split into two, one per navigation.
 *
 * @example
 * ```typescript
 * class Post {
 *   @Column()
 *   @ForeignKey("writer")
 *   writerRef!: number;
 *
 *   @Navigation(() => User)
 *   writer!: Related<User>;
 * }
 * ```
 */
export class ForeignKeyAttributeConvention implements ForeignKeyAddedConvention, ModelFinalizedConvention {
  constructor(
    private readonly inspector: TypeInspector,
    private readonly diagnostics: ModelDiagnostics
  ) {}

  processForeignKeyAdded(
    relationshipBuilder: InternalRelationshipBuilder,
    context: ConventionContext<InternalRelationshipBuilder>
  ): void {
    const foreignKey = relationshipBuilder.metadata;
    let relationship: InternalRelationshipBuilder | undefined = relationshipBuilder;

    let fkPropertyOnPrincipal = this.findForeignKeyAttributeOnProperty(
      foreignKey.principalEntityType,
      foreignKey.principalToDependent?.name
    );
    const fkPropertyOnDependent = this.findForeignKeyAttributeOnProperty(
      foreignKey.declaringEntityType,
      foreignKey.dependentToPrincipal?.name
    );

    if (fkPropertyOnDependent && fkPropertyOnPrincipal) {
      this.diagnostics.warning(
        ModelEventId.ForeignKeyAttributesOnBothPropertiesWarning,
        `Both '${foreignKey.principalEntityType.displayName()}.${fkPropertyOnPrincipal.name}' and '${foreignKey.declaringEntityType.displayName()}.${fkPropertyOnDependent.name}' carry a foreign key attribute for the same relationship. The navigations are configured as separate relationships.`,
        {
          principalToDependent: foreignKey.principalToDependent?.toString(),
          dependentToPrincipal: foreignKey.dependentToPrincipal?.toString(),
          principalProperty: fkPropertyOnPrincipal.name,
          dependentProperty: fkPropertyOnDependent.name,
        }
      );

      relationship = this.splitNavigationsToSeparateRelationships(relationship);
      if (!relationship) {
        context.stopProcessing();
        return;
      }
      fkPropertyOnPrincipal = undefined;
    }

    let fkPropertiesOnPrincipalToDependent = this.findCandidateDependentPropertiesThroughNavigation(
      relationship,
      false
    );
    const fkPropertiesOnDependentToPrincipal = this.findCandidateDependentPropertiesThroughNavigation(
      relationship,
      true
    );

    if (fkPropertiesOnDependentToPrincipal && fkPropertiesOnPrincipalToDependent) {
      this.diagnostics.warning(
        ModelEventId.ForeignKeyAttributesOnBothNavigationsWarning,
        `Both navigations '${relationship.metadata.dependentToPrincipal?.toString()}' and '${relationship.metadata.principalToDependent?.toString()}' carry a foreign key attribute. The navigations are configured as separate relationships.`,
        {
          dependentToPrincipal: relationship.metadata.dependentToPrincipal?.toString(),
          principalToDependent: relationship.metadata.principalToDependent?.toString(),
        }
      );

      relationship = this.splitNavigationsToSeparateRelationships(relationship);
      if (!relationship) {
        context.stopProcessing();
        return;
      }
      fkPropertiesOnPrincipalToDependent = undefined;
    }

    const fkPropertiesOnNavigation = fkPropertiesOnDependentToPrincipal ?? fkPropertiesOnPrincipalToDependent;
    let upgradePrincipalToDependentSource = fkPropertiesOnPrincipalToDependent !== undefined;
    let upgradeDependentToPrincipalSource = fkPropertiesOnDependentToPrincipal !== undefined;
    let shouldInvert = false;
    let fkPropertiesToSet: readonly string[];

    if (!fkPropertiesOnNavigation) {
      if (fkPropertyOnDependent) {
        fkPropertiesToSet = [fkPropertyOnDependent.name];
        upgradeDependentToPrincipalSource = true;
      } else if (fkPropertyOnPrincipal) {
        if (foreignKey.principalToDependent?.isCollection()) {
          context.stopProcessing();
          return;
        }
        shouldInvert = true;
        fkPropertiesToSet = [fkPropertyOnPrincipal.name];
        upgradePrincipalToDependentSource = true;
      } else {
        return;
      }
    } else {
      fkPropertiesToSet = fkPropertiesOnNavigation;

      const fkProperty = fkPropertyOnDependent ?? fkPropertyOnPrincipal;
      if (!fkProperty) {
        if (fkPropertiesOnPrincipalToDependent && foreignKey.isUnique) {
          shouldInvert = true;
        }
      } else {
        if (fkPropertiesOnNavigation.length !== 1 || fkPropertiesOnNavigation[0] !== fkProperty.name) {
          const attributedNavigation = fkPropertiesOnDependentToPrincipal
            ? relationship.metadata.dependentToPrincipal
            : relationship.metadata.principalToDependent;
          this.diagnostics.warning(
            ModelEventId.ConflictingForeignKeyAttributesOnNavigationAndPropertyWarning,
            `The foreign key attribute on navigation '${attributedNavigation?.toString()}' conflicts with the one on property '${fkProperty.name}'. The navigations are configured as separate relationships.`,
            { navigation: attributedNavigation?.toString(), property: fkProperty.name }
          );

          relationship = this.splitNavigationsToSeparateRelationships(relationship);
          if (!relationship) {
            context.stopProcessing();
            return;
          }

          const remaining =
            fkPropertiesOnDependentToPrincipal ?? (fkPropertyOnDependent ? [fkPropertyOnDependent.name] : undefined);
          if (!remaining) {
            // Only the principal side was attributed and it now has a relationship of its own
            return;
          }
          fkPropertiesToSet = remaining;
        }

        if (fkPropertyOnDependent) {
          upgradeDependentToPrincipalSource = true;
        } else {
          shouldInvert = true;
        }
      }
    }

    let newRelationship: InternalRelationshipBuilder | undefined = relationship;
    if (upgradeDependentToPrincipalSource) {
      newRelationship.metadata.updateDependentToPrincipalConfigurationSource(ConfigurationSource.DataAnnotation);
    }
    if (upgradePrincipalToDependentSource) {
      newRelationship.metadata.updatePrincipalToDependentConfigurationSource(ConfigurationSource.DataAnnotation);
    }

    if (shouldInvert) {
      newRelationship = newRelationship.hasEntityTypes(
        foreignKey.declaringEntityType,
        foreignKey.principalEntityType,
        ConfigurationSource.DataAnnotation
      );
    } else {
      this.assertNoConflictingForeignKey(newRelationship, fkPropertiesToSet);
    }

    if (!newRelationship) {
      return;
    }

    const dependentBuilder = newRelationship.metadata.declaringEntityType.builder;
    const properties = dependentBuilder?.getOrCreateProperties(
      fkPropertiesToSet,
      ConfigurationSource.DataAnnotation,
      newRelationship.metadata.principalKey.properties
    );
    newRelationship = properties && newRelationship.hasForeignKey(properties, ConfigurationSource.DataAnnotation);

    if (newRelationship && newRelationship !== relationshipBuilder) {
      context.stopProcessing(newRelationship);
    }
  }

  processModelFinalized(modelBuilder: InternalModelBuilder, _context: ConventionContext<InternalModelBuilder>): void {
    for (const entityType of modelBuilder.metadata.getEntityTypes()) {
      for (const navigation of entityType.getDeclaredNavigations()) {
        if (!navigation.isCollection()) {
          continue;
        }

        const foreignKey = navigation.foreignKey;
        if (this.findForeignKeyAttributeOnProperty(foreignKey.principalEntityType, navigation.name)) {
          throw new ModelConfigurationError(
            `The foreign key attribute on '${foreignKey.principalEntityType.displayName()}' names collection navigation '${navigation.name}'. A foreign key property on the principal '${foreignKey.principalEntityType.displayName()}' cannot back the many side of its relationship with '${foreignKey.declaringEntityType.displayName()}'.`,
            ModelErrorCode.FK_ATTRIBUTE_ON_NON_UNIQUE_PRINCIPAL,
            {
              navigation: navigation.name,
              principalEntityType: foreignKey.principalEntityType.name,
              dependentEntityType: foreignKey.declaringEntityType.name,
            }
          );
        }
      }
    }
  }

  /**
   * Clear the principal-side navigation and give it a relationship of its
   * own. Returns the original builder, now holding only the dependent side.
   */
  private splitNavigationsToSeparateRelationships(
    relationshipBuilder: InternalRelationshipBuilder
  ): InternalRelationshipBuilder | undefined {
    const foreignKey = relationshipBuilder.metadata;
    const toPrincipal = foreignKey.dependentToPrincipal;
    const toDependent = foreignKey.principalToDependent;

    if (this.hasInverseProperty(toPrincipal?.memberInfo) || this.hasInverseProperty(toDependent?.memberInfo)) {
      throw new ModelConfigurationError(
        `The relationship between '${foreignKey.declaringEntityType.displayName()}.${toPrincipal?.name ?? ""}' and '${foreignKey.principalEntityType.displayName()}.${toDependent?.name ?? ""}' is joined by an inverse property attribute, but its foreign key attributes name different properties.`,
        ModelErrorCode.INVALID_RELATIONSHIP_USING_DATA_ANNOTATIONS,
        {
          dependentEntityType: foreignKey.declaringEntityType.name,
          dependentToPrincipal: toPrincipal?.name,
          principalEntityType: foreignKey.principalEntityType.name,
          principalToDependent: toDependent?.name,
        }
      );
    }

    const relationship = relationshipBuilder.hasNavigation(undefined, false, ConfigurationSource.DataAnnotation);
    if (!relationship) {
      return undefined;
    }

    const principalMember = toDependent?.memberInfo;
    if (!principalMember) {
      return relationship;
    }
    const split = foreignKey.principalEntityType.builder?.hasRelationship(
      foreignKey.declaringEntityType,
      principalMember,
      undefined,
      ConfigurationSource.DataAnnotation
    );
    return split ? relationship : undefined;
  }

  /**
   * The scalar member of `entityType` whose foreign key attribute names
   * `navigationName`. Members that are themselves navigations do not count.
   *
   * @throws ModelConfigurationError when several members name the navigation,
   * or the navigation itself names a different member
   */
  private findForeignKeyAttributeOnProperty(
    entityType: EntityType,
    navigationName: string | undefined
  ): MemberInfo | undefined {
    const clrType = entityType.clrType;
    if (!navigationName || !clrType) {
      return undefined;
    }

    let candidate: MemberInfo | undefined;
    for (const member of this.inspector.getMembers(clrType)) {
      if (entityType.builder?.isIgnored(member.name, ConfigurationSource.Convention)) {
        continue;
      }
      const attribute = this.inspector.getAttribute(member, "foreignKey");
      if (attribute !== navigationName || this.inspector.findCandidateNavigationType(member)) {
        continue;
      }

      if (candidate) {
        throw new ModelConfigurationError(
          `Several properties of '${entityType.displayName()}' name navigation '${navigationName}' in a foreign key attribute. Composite foreign keys must be named on the navigation instead.`,
          ModelErrorCode.COMPOSITE_FK_ON_PROPERTY,
          { entityType: entityType.name, navigation: navigationName }
        );
      }
      candidate = member;
    }

    if (candidate) {
      const navigationMember = this.inspector.findMember(clrType, navigationName);
      const attributeOnNavigation = navigationMember && this.inspector.getAttribute(navigationMember, "foreignKey");
      if (attributeOnNavigation !== undefined && attributeOnNavigation !== candidate.name) {
        throw new ModelConfigurationError(
          `Property '${candidate.name}' names navigation '${navigationName}' of '${entityType.displayName()}' in a foreign key attribute, but the navigation names '${attributeOnNavigation}'.`,
          ModelErrorCode.FK_ATTRIBUTE_ON_PROPERTY_NAVIGATION_MISMATCH,
          { entityType: entityType.name, navigation: navigationName, property: candidate.name }
        );
      }
    }

    return candidate;
  }

  /**
   * Property names listed in the foreign key attribute of one navigation.
   */
  private findCandidateDependentPropertiesThroughNavigation(
    relationshipBuilder: InternalRelationshipBuilder,
    pointsToPrincipal: boolean
  ): string[] | undefined {
    const navigation = relationshipBuilder.metadata.getNavigation(pointsToPrincipal);
    const member = navigation?.memberInfo;
    const attribute = member && this.inspector.getAttribute(member, "foreignKey");
    if (!navigation || !member || attribute === undefined) {
      return undefined;
    }

    const entityType = navigation.declaringEntityType;
    const names = attribute.split(",").map((name) => name.trim());
    if (names.some((name) => name.length === 0)) {
      throw new ModelConfigurationError(
        `The foreign key attribute on navigation '${navigation.name}' of '${entityType.displayName()}' is not a valid comma-separated list of property names.`,
        ModelErrorCode.INVALID_PROPERTY_LIST_ON_NAVIGATION,
        { entityType: entityType.name, navigation: navigation.name, attribute }
      );
    }

    const clrType = entityType.clrType;
    const targetType = this.inspector.findCandidateNavigationType(member);
    const isCollection = this.inspector.isCollection(member);
    const otherNavigations = clrType
      ? this.inspector
          .getMembers(clrType)
          .filter(
            (m) =>
              m.name !== member.name &&
              this.inspector.findCandidateNavigationType(m) === targetType &&
              this.inspector.isCollection(m) === isCollection
          )
          .sort((a, b) => a.name.localeCompare(b.name))
      : [];

    for (const other of otherNavigations) {
      if (this.inspector.getAttribute(other, "foreignKey") === attribute) {
        throw new ModelConfigurationError(
          `Several navigations of '${entityType.displayName()}' name foreign key '${attribute}'.`,
          ModelErrorCode.MULTIPLE_NAVIGATIONS_SAME_FK,
          { entityType: entityType.name, foreignKey: attribute }
        );
      }
    }

    return names;
  }

  /**
   * @throws ModelConfigurationError when the named properties already back a
   * different attribute-configured foreign key to the same principal
   */
  private assertNoConflictingForeignKey(
    relationshipBuilder: InternalRelationshipBuilder,
    propertyNames: readonly string[]
  ): void {
    const foreignKey = relationshipBuilder.metadata;
    const dependent = foreignKey.declaringEntityType;
    const existing = dependent.findProperties(propertyNames);
    if (!existing) {
      return;
    }

    const conflicting = dependent
      .findForeignKeys(existing)
      .find(
        (fk) =>
          fk !== foreignKey &&
          fk.principalEntityType === foreignKey.principalEntityType &&
          fk.configurationSource === ConfigurationSource.DataAnnotation &&
          fk.propertiesConfigurationSource === ConfigurationSource.DataAnnotation
      );
    if (conflicting) {
      throw new ModelConfigurationError(
        `The foreign key attributes on '${dependent.displayName()}' name properties ${formatProperties(existing)} for more than one relationship.`,
        ModelErrorCode.CONFLICTING_FOREIGN_KEY_ATTRIBUTES,
        { entityType: dependent.name, properties: existing.map((p) => p.name) }
      );
    }
  }

  private hasInverseProperty(member: MemberInfo | undefined): boolean {
    return member !== undefined && this.inspector.getAttribute(member, "inverseProperty") !== undefined;
  }
}
