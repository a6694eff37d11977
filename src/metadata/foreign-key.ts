import { Annotatable } from "./annotatable";
import { ConfigurationSource, max } from "./configuration-source";
import type { EntityType } from "./entity-type";
import type { Key } from "./key";
import type { Navigation } from "./navigation";
import type { Property } from "./property";
import type { InternalRelationshipBuilder } from "./internal-relationship-builder";

/**
 * A relationship between a dependent (declaring) entity type and a principal
 * entity type. Each mutable facet records its own configuration source.
 */
export class ForeignKey extends Annotatable {
  builder: InternalRelationshipBuilder | undefined;

  properties: readonly Property[];
  propertiesConfigurationSource: ConfigurationSource | undefined;

  principalKey: Key;
  principalKeyConfigurationSource: ConfigurationSource | undefined;
  principalEndConfigurationSource: ConfigurationSource | undefined;

  dependentToPrincipal: Navigation | undefined;
  dependentToPrincipalConfigurationSource: ConfigurationSource | undefined;
  principalToDependent: Navigation | undefined;
  principalToDependentConfigurationSource: ConfigurationSource | undefined;

  isUnique = false;
  isUniqueConfigurationSource: ConfigurationSource | undefined;
  isRequired = false;
  isRequiredConfigurationSource: ConfigurationSource | undefined;
  isOwnership = false;
  isOwnershipConfigurationSource: ConfigurationSource | undefined;

  constructor(
    properties: readonly Property[],
    principalKey: Key,
    readonly declaringEntityType: EntityType,
    readonly principalEntityType: EntityType,
    public configurationSource: ConfigurationSource
  ) {
    super();
    this.properties = properties;
    this.principalKey = principalKey;
  }

  get isInModel(): boolean {
    return this.builder !== undefined;
  }

  getNavigation(pointsToPrincipal: boolean): Navigation | undefined {
    return pointsToPrincipal ? this.dependentToPrincipal : this.principalToDependent;
  }

  getNavigationConfigurationSource(pointsToPrincipal: boolean): ConfigurationSource | undefined {
    return pointsToPrincipal
      ? this.dependentToPrincipalConfigurationSource
      : this.principalToDependentConfigurationSource;
  }

  getNavigations(): Navigation[] {
    const navigations: Navigation[] = [];
    if (this.dependentToPrincipal) navigations.push(this.dependentToPrincipal);
    if (this.principalToDependent) navigations.push(this.principalToDependent);
    return navigations;
  }

  isSelfReferencing(): boolean {
    return this.declaringEntityType === this.principalEntityType;
  }

  updateConfigurationSource(configurationSource: ConfigurationSource): void {
    this.configurationSource = max(this.configurationSource, configurationSource) ?? configurationSource;
  }

  updateDependentToPrincipalConfigurationSource(configurationSource: ConfigurationSource): void {
    this.dependentToPrincipalConfigurationSource = max(
      this.dependentToPrincipalConfigurationSource,
      configurationSource
    );
  }

  updatePrincipalToDependentConfigurationSource(configurationSource: ConfigurationSource): void {
    this.principalToDependentConfigurationSource = max(
      this.principalToDependentConfigurationSource,
      configurationSource
    );
  }

  updatePropertiesConfigurationSource(configurationSource: ConfigurationSource): void {
    this.propertiesConfigurationSource = max(this.propertiesConfigurationSource, configurationSource);
  }

  toString(): string {
    return `${this.declaringEntityType.displayName()} {${this.properties
      .map((p) => `'${p.name}'`)
      .join(", ")}} -> ${this.principalEntityType.displayName()}`;
  }
}
