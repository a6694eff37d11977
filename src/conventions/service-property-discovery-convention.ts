import { ConfigurationSource, overrides } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalModelBuilder } from "../metadata/internal-model-builder";
import { ModelConfigurationError, ModelErrorCode } from "../errors";
import { ModelEventId } from "../diagnostics";
import type { ModelDiagnostics } from "../diagnostics";
import type { ParameterBindingFactories } from "../parameter-binding";
import type { TypeInspector } from "../reflection";
import type { MemberInfo } from "../types";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeAddedConvention,
  EntityTypeBaseTypeChangedConvention,
  EntityTypeMemberIgnoredConvention,
  EntityTypeRemovedConvention,
  ModelFinalizedConvention,
} from "./convention-events";

type DuplicateServiceProperties = Map<Function, Set<MemberInfo>>;

/**
 * Binds unmapped members to services when a parameter binding factory
 * accepts their type.
 *
 * Two members of one service type on the same entity type are ambiguous:
 * neither is bound and both wait in a ledger. Ignoring all but one binds the
 * survivor. Whatever is still ambiguous at finalization is an error.
 */
export class ServicePropertyDiscoveryConvention
  implements
    EntityTypeAddedConvention,
    EntityTypeBaseTypeChangedConvention,
    EntityTypeMemberIgnoredConvention,
    EntityTypeRemovedConvention,
    ModelFinalizedConvention
{
  private readonly duplicates = new Map<EntityType, DuplicateServiceProperties>();

  constructor(
    private readonly inspector: TypeInspector,
    private readonly bindingFactories: ParameterBindingFactories,
    private readonly diagnostics?: ModelDiagnostics
  ) {}

  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    this.process(entityTypeBuilder);
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    _context: ConventionContext<EntityType | undefined>
  ): void {
    this.process(entityTypeBuilder);
  }

  private process(entityTypeBuilder: InternalEntityTypeBuilder): void {
    const entityType = entityTypeBuilder.metadata;
    const clrType = entityType.clrType;
    if (!clrType) {
      return;
    }

    for (const member of this.inspector.getMembers(clrType)) {
      const type = member.type;
      if (
        !type ||
        entityTypeBuilder.isIgnored(member.name) ||
        entityType.findProperty(member.name) ||
        entityType.findNavigation(member.name) ||
        entityType.findServiceProperty(member.name) ||
        this.inspector.getAttribute(member, "navigation") ||
        this.inspector.findColumnType(member)
      ) {
        continue;
      }

      const factory = this.bindingFactories.findFactory(type, member.name);
      if (!factory) {
        continue;
      }

      const pending = this.duplicates.get(entityType)?.get(type);
      if (pending) {
        pending.add(member);
        continue;
      }

      const other = entityType.getServiceProperties().find((p) => p.clrType === type);
      if (other) {
        if (overrides(ConfigurationSource.Convention, other.configurationSource)) {
          other.declaringEntityType.builder?.removeServiceProperty(other, ConfigurationSource.Convention);
        }
        this.addDuplicate(entityType, type, member);
        this.addDuplicate(entityType, type, other.memberInfo);
        this.diagnostics?.information(
          ModelEventId.AmbiguousServicePropertyInformation,
          `'${entityType.displayName()}' has several members of service type '${type.name}'; none of them is bound until all but one are ignored.`,
          { entityType: entityType.name, serviceType: type.name, members: [other.name, member.name] }
        );
        continue;
      }

      entityTypeBuilder
        .serviceProperty(member, ConfigurationSource.Convention)
        ?.hasParameterBinding(factory.bind(entityType, type, member.name), ConfigurationSource.Convention);
    }
  }

  processEntityTypeMemberIgnored(
    entityTypeBuilder: InternalEntityTypeBuilder,
    name: string,
    _context: ConventionContext<string>
  ): void {
    const entityType = entityTypeBuilder.metadata;
    const duplicateMap = this.duplicates.get(entityType);
    const clrType = entityType.clrType;
    if (!duplicateMap || !clrType) {
      return;
    }

    const member = this.inspector.getMembers(clrType).find((m) => m.name === name);
    const type = member?.type;
    if (!member || !type) {
      return;
    }

    const candidates = duplicateMap.get(type);
    if (!candidates || !candidates.delete(member) || candidates.size !== 1) {
      return;
    }

    const [survivor] = candidates;
    duplicateMap.delete(type);
    if (duplicateMap.size === 0) {
      this.duplicates.delete(entityType);
    }

    const factory = this.bindingFactories.findFactory(type, survivor.name);
    if (factory) {
      entityTypeBuilder
        .serviceProperty(survivor, ConfigurationSource.Convention)
        ?.hasParameterBinding(factory.bind(entityType, type, survivor.name), ConfigurationSource.Convention);
    }
  }

  processEntityTypeRemoved(
    _modelBuilder: InternalModelBuilder,
    entityType: EntityType,
    _context: ConventionContext<EntityType>
  ): void {
    this.duplicates.delete(entityType);
  }

  /**
   * @throws ModelConfigurationError naming the first member still ambiguous
   */
  processModelFinalized(
    _modelBuilder: InternalModelBuilder,
    _context: ConventionContext<InternalModelBuilder>
  ): void {
    try {
      for (const [entityType, duplicateMap] of this.duplicates) {
        if (!entityType.isInModel) {
          continue;
        }
        for (const [type, members] of duplicateMap) {
          for (const member of members) {
            if (!entityType.findProperty(member.name) && !entityType.findNavigation(member.name)) {
              throw new ModelConfigurationError(
                `The member '${member.name}' of type '${type.name}' on '${entityType.displayName()}' is one of several members of the same service type. Ignore all but one of them.`,
                ModelErrorCode.AMBIGUOUS_SERVICE_PROPERTY,
                { entityType: entityType.name, member: member.name, serviceType: type.name }
              );
            }
          }
        }
      }
    } finally {
      this.duplicates.clear();
    }
  }

  private addDuplicate(entityType: EntityType, type: Function, member: MemberInfo): void {
    let duplicateMap = this.duplicates.get(entityType);
    if (!duplicateMap) {
      duplicateMap = new Map();
      this.duplicates.set(entityType, duplicateMap);
    }
    let members = duplicateMap.get(type);
    if (!members) {
      members = new Set();
      duplicateMap.set(type, members);
    }
    members.add(member);
  }
}
