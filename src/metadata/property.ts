import { Annotatable } from "./annotatable";
import { ConfigurationSource, max } from "./configuration-source";
import { TYPE_MAP, isSupportedType } from "../types";
import type { ColumnType, MemberInfo, ValueGenerated } from "../types";
import type { EntityType } from "./entity-type";
import type { Key } from "./key";
import type { ForeignKey } from "./foreign-key";
import type { InternalPropertyBuilder } from "./internal-property-builder";

/**
 * A scalar mapped member. State is mutated through InternalPropertyBuilder.
 */
export class Property extends Annotatable {
  builder: InternalPropertyBuilder | undefined;

  clrType: Function;
  typeConfigurationSource: ConfigurationSource | undefined;
  columnType: ColumnType | undefined;

  isNullable = true;
  isNullableConfigurationSource: ConfigurationSource | undefined;

  valueGenerated: ValueGenerated = "never";
  valueGeneratedConfigurationSource: ConfigurationSource | undefined;

  readonly keys = new Set<Key>();
  readonly foreignKeys = new Set<ForeignKey>();

  constructor(
    readonly name: string,
    readonly declaringEntityType: EntityType,
    clrType: Function,
    readonly memberInfo: MemberInfo | undefined,
    public configurationSource: ConfigurationSource,
    typeConfigurationSource?: ConfigurationSource,
    columnType?: ColumnType
  ) {
    super();
    this.clrType = clrType;
    this.typeConfigurationSource = typeConfigurationSource;
    this.columnType = columnType ?? Property.defaultColumnType(clrType);
  }

  static defaultColumnType(clrType: Function): ColumnType | undefined {
    return isSupportedType(clrType.name) ? TYPE_MAP[clrType.name] : undefined;
  }

  get isInModel(): boolean {
    return this.builder !== undefined;
  }

  isShadowProperty(): boolean {
    return this.memberInfo === undefined;
  }

  isKey(): boolean {
    return this.keys.size > 0;
  }

  isForeignKey(): boolean {
    return this.foreignKeys.size > 0;
  }

  isPrimaryKey(): boolean {
    return this.findContainingPrimaryKey() !== undefined;
  }

  findContainingPrimaryKey(): Key | undefined {
    const primaryKey = this.declaringEntityType.findPrimaryKey();
    return primaryKey?.properties.includes(this) ? primaryKey : undefined;
  }

  updateConfigurationSource(configurationSource: ConfigurationSource): void {
    this.configurationSource = max(this.configurationSource, configurationSource) ?? configurationSource;
  }

  toString(): string {
    return `${this.declaringEntityType.displayName()}.${this.name}`;
  }
}
