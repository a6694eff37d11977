/**
 * TypeInspector: the seam between conventions and runtime type information.
 *
 * Conventions never call reflect-metadata directly. They ask an inspector
 * which members a class has, which attributes a member carries, and whether
 * a member looks like a scalar or a navigation. The default implementation
 * reads what the decorators recorded; tests or other metadata sources can
 * supply their own.
 */

import "reflect-metadata";
import {
  MEMBERS_KEY,
  MEMBER_ATTRIBUTE_KEYS,
  TYPE_ATTRIBUTE_KEYS,
  TYPE_MAP,
  isSupportedType,
} from "./types";
import type {
  ColumnType,
  MemberAttributes,
  MemberInfo,
  TypeAttributes,
} from "./types";

export interface TypeInspector {
  /** Declared and inherited members, least derived declaring type first */
  getMembers(type: Function): readonly MemberInfo[];
  /** Finds a member by name, case-insensitively when exact match fails */
  findMember(type: Function, name: string): MemberInfo | undefined;
  getAttribute<K extends keyof MemberAttributes>(
    member: MemberInfo,
    kind: K
  ): MemberAttributes[K] | undefined;
  getTypeAttribute<K extends keyof TypeAttributes>(
    type: Function,
    kind: K
  ): TypeAttributes[K] | undefined;
  /** Column type of a viable mapped scalar, undefined otherwise */
  findColumnType(member: MemberInfo): ColumnType | undefined;
  /** Target class of a viable navigation, undefined otherwise */
  findCandidateNavigationType(member: MemberInfo): Function | undefined;
  isCollection(member: MemberInfo): boolean;
  isAssignableFrom(baseType: Function, derivedType: Function): boolean;
}

/**
 * Reads metadata recorded by the decorators in ./decorators.
 */
export class DecoratorTypeInspector implements TypeInspector {
  private memberCache = new Map<Function, readonly MemberInfo[]>();
  private resolvedMembers = new WeakMap<MemberInfo, MemberInfo>();

  getMembers(type: Function): readonly MemberInfo[] {
    const cached = this.memberCache.get(type);
    if (cached) {
      return cached;
    }

    const chain: Function[] = [];
    for (
      let current: unknown = type;
      typeof current === "function" && current !== Function.prototype;
      current = Object.getPrototypeOf(current)
    ) {
      chain.unshift(current);
    }

    const byName = new Map<string, MemberInfo>();
    for (const declaringType of chain) {
      const own: MemberInfo[] =
        Reflect.getOwnMetadata(MEMBERS_KEY, declaringType) || [];
      for (const member of own) {
        // A redeclared member replaces the inherited one
        byName.delete(member.name);
        byName.set(member.name, this.resolveMember(member));
      }
    }

    const members = [...byName.values()];
    this.memberCache.set(type, members);
    return members;
  }

  /** Applies a deferred `@Member` type once its class can be referenced */
  private resolveMember(member: MemberInfo): MemberInfo {
    const memberType = this.getAttribute(member, "memberType");
    if (!memberType) {
      return member;
    }

    let resolved = this.resolvedMembers.get(member);
    if (!resolved) {
      resolved = { ...member, type: memberType() };
      this.resolvedMembers.set(member, resolved);
    }
    return resolved;
  }

  findMember(type: Function, name: string): MemberInfo | undefined {
    const members = this.getMembers(type);
    const lowered = name.toLowerCase();
    return (
      members.find((m) => m.name === name) ??
      members.find((m) => m.name.toLowerCase() === lowered)
    );
  }

  getAttribute<K extends keyof MemberAttributes>(
    member: MemberInfo,
    kind: K
  ): MemberAttributes[K] | undefined {
    const prototype: unknown = member.declaringType.prototype;
    if (typeof prototype !== "object" || prototype === null) {
      return undefined;
    }
    return Reflect.getMetadata(MEMBER_ATTRIBUTE_KEYS[kind], prototype, member.name);
  }

  getTypeAttribute<K extends keyof TypeAttributes>(
    type: Function,
    kind: K
  ): TypeAttributes[K] | undefined {
    return Reflect.getOwnMetadata(TYPE_ATTRIBUTE_KEYS[kind], type);
  }

  findColumnType(member: MemberInfo): ColumnType | undefined {
    if (this.getAttribute(member, "navigation")) {
      return undefined;
    }

    const column = this.getAttribute(member, "column");
    if (column?.type) {
      return column.type;
    }

    const typeName = member.type?.name;
    return typeName && isSupportedType(typeName) ? TYPE_MAP[typeName] : undefined;
  }

  findCandidateNavigationType(member: MemberInfo): Function | undefined {
    const navigation = this.getAttribute(member, "navigation");
    return navigation?.target();
  }

  isCollection(member: MemberInfo): boolean {
    return this.getAttribute(member, "navigation")?.collection ?? false;
  }

  isAssignableFrom(baseType: Function, derivedType: Function): boolean {
    return derivedType === baseType || derivedType.prototype instanceof baseType;
  }
}

/**
 * Two members are the same when they share a name and one declaring type
 * derives from the other (an override or a redeclaration).
 */
export function isSameMember(
  inspector: TypeInspector,
  first: MemberInfo,
  second: MemberInfo
): boolean {
  return (
    first.name === second.name &&
    (inspector.isAssignableFrom(first.declaringType, second.declaringType) ||
      inspector.isAssignableFrom(second.declaringType, first.declaringType))
  );
}
