/**
 * Decorators for defining entity metadata.
 * These decorators use reflect-metadata to store schema information on class
 * constructors and prototypes.
 *
 * Key principle: Decorators are purely declarative. They don't build the
 * model; they annotate TypeScript classes with metadata that the
 * conventions read through a TypeInspector while the model is built.
 */

import "reflect-metadata";
import {
  ENTITY_KEY,
  MEMBERS_KEY,
  COLUMN_KEY,
  PRIMARY_KEY,
  FOREIGN_KEY,
  INVERSE_PROPERTY_KEY,
  NAVIGATION_KEY,
  NOT_MAPPED_KEY,
  DATABASE_GENERATED_KEY,
  OWNED_KEY,
  KEYLESS_KEY,
  CONTAINER_KEY,
  MEMBER_TYPE_KEY,
  ColumnAttribute,
  ColumnType,
  MemberInfo,
  NavigationAttribute,
  ValueGenerated,
} from "./types";

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Record a member on its declaring class. Every member decorator goes through
 * here so the TypeInspector can enumerate members without instances.
 */
function registerMember(target: object, propertyKey: string | symbol): MemberInfo {
  if (typeof propertyKey !== "string") {
    throw new Error(
      `Symbol-keyed member ${String(propertyKey)} cannot be mapped.`
    );
  }

  const declaringType = target.constructor;
  const members: MemberInfo[] =
    Reflect.getOwnMetadata(MEMBERS_KEY, declaringType) || [];

  const existing = members.find((m) => m.name === propertyKey);
  if (existing) {
    return existing;
  }

  const member: MemberInfo = {
    name: propertyKey,
    declaringType,
    type: Reflect.getMetadata("design:type", target, propertyKey),
  };
  Reflect.defineMetadata(MEMBERS_KEY, [...members, member], declaringType);
  return member;
}

function memberDecorator(key: symbol, value: unknown): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerMember(target, propertyKey);
    Reflect.defineMetadata(key, value, target, propertyKey);
  };
}

/**
 * Entity decorator marks a class as an entity and names its table.
 * Entity types for decorated classes are pinned at DataAnnotation source,
 * so they survive unreachable-type cleanup.
 *
 * @param tableName - The name of the table; defaults to the class name
 *
 * @example
 * ```typescript
 * @Entity("customers")
 * class Customer {
 *   @Column()
 *   id!: number;
 * }
 * ```
 */
export function Entity(tableName?: string): ClassDecorator {
  return (target: Function) => {
    const name = tableName ?? target.name;
    if (!name || name.trim().length === 0) {
      throw new Error(`Entity decorator requires a non-empty table name.`);
    }

    if (!IDENTIFIER.test(name)) {
      throw new Error(
        `Invalid table name "${name}". Must start with letter or underscore and contain only alphanumeric characters and underscores.`
      );
    }

    Reflect.defineMetadata(ENTITY_KEY, name, target);
  };
}

/**
 * Column decorator maps a TypeScript property to a scalar column.
 *
 * Detects the runtime type (String, Number, Boolean, Date) via
 * emitDecoratorMetadata. `isPrimary` is shorthand for `@Key()`.
 *
 * @param columnName - Optional column name. Defaults to property name.
 * @param isPrimary - Optional flag for primary key columns
 * @param type - Optional column type overriding the runtime type mapping
 *
 * @example
 * ```typescript
 * class Order {
 *   @Column("order_id", true)
 *   id!: number;
 *
 *   @Column("reference", false, "uuid")
 *   reference!: string;
 * }
 * ```
 */
export function Column(
  columnName?: string,
  isPrimary?: boolean,
  type?: ColumnType
): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    const member = registerMember(target, propertyKey);

    if (!member.type) {
      throw new Error(
        `@Column on ${String(propertyKey)} failed to detect type. Ensure emitDecoratorMetadata is enabled in tsconfig.json`
      );
    }

    const column: ColumnAttribute = {
      name: columnName || member.name,
      type,
    };
    Reflect.defineMetadata(COLUMN_KEY, column, target, propertyKey);

    if (isPrimary) {
      Reflect.defineMetadata(PRIMARY_KEY, true, target, propertyKey);
    }
  };
}

/**
 * Declares a member without a mapping opinion. Conventions decide what it
 * becomes; injected services are declared this way.
 *
 * @param type - Optional deferred runtime type, for interface-typed members
 *   or classes declared further down the module
 */
export function Member(type?: () => Function): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerMember(target, propertyKey);
    if (type) {
      Reflect.defineMetadata(MEMBER_TYPE_KEY, type, target, propertyKey);
    }
  };
}

/**
 * Marks a member as part of the primary key.
 * Composite keys follow member declaration order.
 */
export function Key(): PropertyDecorator {
  return memberDecorator(PRIMARY_KEY, true);
}

/**
 * On a scalar member, names the navigation the member backs.
 * On a navigation member, lists the foreign key properties (comma-separated).
 *
 * @example
 * ```typescript
 * class Order {
 *   @ForeignKey("customer")
 *   @Column()
 *   customerId!: number;
 *
 *   @Navigation(() => Customer)
 *   customer!: Related<Customer>;
 * }
 * ```
 */
export function ForeignKey(name: string): PropertyDecorator {
  return memberDecorator(FOREIGN_KEY, name);
}

/**
 * Names the navigation on the target type that is the inverse of this one.
 */
export function InverseProperty(name: string): PropertyDecorator {
  return memberDecorator(INVERSE_PROPERTY_KEY, name);
}

/**
 * Declares a navigation member.
 *
 * @param target - Deferred reference to the target entity class
 * @param options - `collection` overrides the Array detection
 */
export function Navigation(
  target: () => Function,
  options: { collection?: boolean } = {}
): PropertyDecorator {
  return (proto: object, propertyKey: string | symbol) => {
    const member = registerMember(proto, propertyKey);
    const navigation: NavigationAttribute = {
      target,
      collection: options.collection ?? (member.type === Array ? true : undefined),
    };
    Reflect.defineMetadata(NAVIGATION_KEY, navigation, proto, propertyKey);
  };
}

/**
 * Excludes a member from the model.
 */
export function NotMapped(): PropertyDecorator {
  return memberDecorator(NOT_MAPPED_KEY, true);
}

/**
 * Pins how the store generates the member's value.
 */
export function DatabaseGenerated(option: ValueGenerated): PropertyDecorator {
  return memberDecorator(DATABASE_GENERATED_KEY, option);
}

/**
 * Marks a class as owned: it is only reachable through its owner.
 */
export function Owned(): ClassDecorator {
  return (target: Function) => {
    Reflect.defineMetadata(OWNED_KEY, true, target);
  };
}

/**
 * Marks a class as having no key.
 */
export function Keyless(): ClassDecorator {
  return (target: Function) => {
    Reflect.defineMetadata(KEYLESS_KEY, true, target);
  };
}

/**
 * Names the document container an entity class is stored in.
 */
export function Container(name: string): ClassDecorator {
  return (target: Function) => {
    if (!name || name.trim().length === 0) {
      throw new Error(`Container decorator requires a non-empty name.`);
    }
    Reflect.defineMetadata(CONTAINER_KEY, name, target);
  };
}
