/**
 * An ordered, editable list of conventions.
 *
 * Order matters: for one event kind, conventions run in the order they sit
 * in the set. The factories below build the two stock sets.
 */

import type { Convention, ConventionEventKind, ConventionFor } from "./convention-events";
import { implementsConvention } from "../type-guards";
import type { TypeInspector } from "../reflection";
import type { ModelDiagnostics } from "../diagnostics";
import type { ParameterBindingFactories } from "../parameter-binding";
import { EntityAttributeConvention } from "./entity-attribute-convention";
import { InheritanceDiscoveryConvention } from "./inheritance-discovery-convention";
import { KeylessAttributeConvention } from "./keyless-attribute-convention";
import { NotMappedMemberAttributeConvention } from "./not-mapped-member-attribute-convention";
import { PropertyDiscoveryConvention } from "./property-discovery-convention";
import { ServicePropertyDiscoveryConvention } from "./service-property-discovery-convention";
import { KeyDiscoveryConvention } from "./key-discovery-convention";
import { KeyAttributeConvention } from "./key-attribute-convention";
import { DatabaseGeneratedAttributeConvention } from "./database-generated-attribute-convention";
import { InversePropertyAttributeConvention } from "./inverse-property-attribute-convention";
import { RelationshipDiscoveryConvention } from "./relationship-discovery-convention";
import { ForeignKeyAttributeConvention } from "./foreign-key-attribute-convention";
import { ValueGeneratorConvention } from "./value-generator-convention";
import { ModelCleanupConvention } from "./model-cleanup-convention";
import { ContainerAttributeConvention } from "./container-attribute-convention";
import { StoreKeyConvention } from "./store-key-convention";

export type ConventionType<T extends Convention = Convention> = abstract new (...args: never[]) => T;

export interface ConventionSetDependencies {
  inspector: TypeInspector;
  diagnostics: ModelDiagnostics;
  bindingFactories: ParameterBindingFactories;
}

export class ConventionSet {
  private readonly conventions: Convention[] = [];

  constructor(conventions: Convention[] = []) {
    this.conventions.push(...conventions);
  }

  add(convention: Convention): this {
    this.conventions.push(convention);
    return this;
  }

  /**
   * Insert `convention` before the first convention of type `before`.
   * Appends when no such convention is registered.
   */
  addBefore(before: ConventionType, convention: Convention): this {
    const index = this.conventions.findIndex((c) => c instanceof before);
    if (index < 0) {
      this.conventions.push(convention);
    } else {
      this.conventions.splice(index, 0, convention);
    }
    return this;
  }

  /**
   * Swap every convention of the same class as `convention` for it, keeping
   * the position of the first one. Returns false when none was registered.
   */
  replace(convention: Convention): boolean {
    const type = convention.constructor;
    const index = this.conventions.findIndex((c) => c.constructor === type);
    if (index < 0) {
      return false;
    }
    this.remove(type);
    this.conventions.splice(index, 0, convention);
    return true;
  }

  remove(type: Function): boolean {
    const before = this.conventions.length;
    for (let i = this.conventions.length - 1; i >= 0; i--) {
      if (this.conventions[i].constructor === type) {
        this.conventions.splice(i, 1);
      }
    }
    return this.conventions.length !== before;
  }

  has(type: ConventionType): boolean {
    return this.conventions.some((c) => c instanceof type);
  }

  find<T extends Convention>(type: ConventionType<T>): T | undefined {
    for (const convention of this.conventions) {
      if (convention instanceof type) {
        return convention;
      }
    }
    return undefined;
  }

  getConventions<K extends ConventionEventKind>(kind: K): ConventionFor<K>[] {
    const matching: ConventionFor<K>[] = [];
    for (const convention of this.conventions) {
      if (implementsConvention(convention, kind)) {
        matching.push(convention);
      }
    }
    return matching;
  }

  getAll(): readonly Convention[] {
    return this.conventions;
  }
}

/**
 * Conventions for a relational-style model built from decorated classes.
 */
export function createCoreConventionSet(dependencies: ConventionSetDependencies): ConventionSet {
  const { inspector, diagnostics, bindingFactories } = dependencies;
  const inverseProperty = new InversePropertyAttributeConvention(inspector, diagnostics);

  return new ConventionSet([
    new EntityAttributeConvention(inspector),
    new InheritanceDiscoveryConvention(),
    new NotMappedMemberAttributeConvention(inspector),
    new KeylessAttributeConvention(inspector),
    new PropertyDiscoveryConvention(inspector),
    new ServicePropertyDiscoveryConvention(inspector, bindingFactories, diagnostics),
    new KeyAttributeConvention(inspector),
    new KeyDiscoveryConvention(),
    new DatabaseGeneratedAttributeConvention(inspector),
    inverseProperty,
    new RelationshipDiscoveryConvention(inspector, inverseProperty),
    new ForeignKeyAttributeConvention(inspector, diagnostics),
    new ValueGeneratorConvention(),
    new ModelCleanupConvention(diagnostics),
  ]);
}

/**
 * Core conventions plus container naming and synthesized document keys.
 */
export function createDocumentStoreConventionSet(
  dependencies: ConventionSetDependencies
): ConventionSet {
  const set = createCoreConventionSet(dependencies);
  set.addBefore(PropertyDiscoveryConvention, new ContainerAttributeConvention(dependencies.inspector));
  set.addBefore(KeyAttributeConvention, new StoreKeyConvention());
  return set;
}
