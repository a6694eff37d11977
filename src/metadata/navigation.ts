import { Annotatable } from "./annotatable";
import type { ConfigurationSource } from "./configuration-source";
import type { MemberInfo } from "../types";
import type { EntityType } from "./entity-type";
import type { ForeignKey } from "./foreign-key";

/**
 * A directional edge of a foreign key. A navigation belongs to its foreign
 * key; the inverse is looked up through the key, never stored.
 */
export class Navigation extends Annotatable {
  constructor(
    readonly name: string,
    readonly foreignKey: ForeignKey,
    readonly isDependentToPrincipal: boolean,
    readonly memberInfo: MemberInfo | undefined
  ) {
    super();
  }

  get isInModel(): boolean {
    return (
      this.foreignKey.isInModel &&
      this.foreignKey.getNavigation(this.isDependentToPrincipal) === this
    );
  }

  get declaringEntityType(): EntityType {
    return this.isDependentToPrincipal
      ? this.foreignKey.declaringEntityType
      : this.foreignKey.principalEntityType;
  }

  get targetEntityType(): EntityType {
    return this.isDependentToPrincipal
      ? this.foreignKey.principalEntityType
      : this.foreignKey.declaringEntityType;
  }

  get configurationSource(): ConfigurationSource | undefined {
    return this.isDependentToPrincipal
      ? this.foreignKey.dependentToPrincipalConfigurationSource
      : this.foreignKey.principalToDependentConfigurationSource;
  }

  isCollection(): boolean {
    return !this.isDependentToPrincipal && !this.foreignKey.isUnique;
  }

  findInverse(): Navigation | undefined {
    return this.foreignKey.getNavigation(!this.isDependentToPrincipal);
  }

  toString(): string {
    return `${this.declaringEntityType.displayName()}.${this.name}`;
  }
}
