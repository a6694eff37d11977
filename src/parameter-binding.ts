/**
 * Parameter binding factories decide which members are bound to services.
 *
 * A factory is looked up by member type and name. When one answers, the
 * member becomes a service property carrying the binding it produced.
 */

import type { EntityType } from "./metadata/entity-type";

export interface ServiceParameterBinding {
  /** Service type the member receives */
  readonly serviceType: Function;
  /** Member the service is assigned to */
  readonly memberName: string;
  /** Entity type the binding was created for */
  readonly entityTypeName: string;
}

export interface ParameterBindingFactory {
  canBind(type: Function, memberName: string): boolean;
  bind(entityType: EntityType, type: Function, memberName: string): ServiceParameterBinding;
}

export interface ParameterBindingFactories {
  findFactory(type: Function, memberName: string): ParameterBindingFactory | undefined;
}

/**
 * Binds members whose runtime type is exactly the registered service type.
 */
export class ServiceParameterBindingFactory implements ParameterBindingFactory {
  constructor(readonly serviceType: Function) {}

  canBind(type: Function): boolean {
    return type === this.serviceType;
  }

  bind(entityType: EntityType, type: Function, memberName: string): ServiceParameterBinding {
    return {
      serviceType: type,
      memberName,
      entityTypeName: entityType.name,
    };
  }
}

export class ServiceParameterBindingFactories implements ParameterBindingFactories {
  private readonly factories: readonly ParameterBindingFactory[];

  constructor(factories: readonly ParameterBindingFactory[] = []) {
    this.factories = [...factories];
  }

  /**
   * @example
   * ```typescript
   * const factories = ServiceParameterBindingFactories.forServiceTypes([AuditLogger]);
   * ```
   */
  static forServiceTypes(serviceTypes: readonly Function[]): ServiceParameterBindingFactories {
    return new ServiceParameterBindingFactories(
      serviceTypes.map((type) => new ServiceParameterBindingFactory(type))
    );
  }

  findFactory(type: Function, memberName: string): ParameterBindingFactory | undefined {
    return this.factories.find((f) => f.canBind(type, memberName));
  }
}
