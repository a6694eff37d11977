import { Annotatable } from "./annotatable";
import { ConfigurationSource, max } from "./configuration-source";
import type { MemberInfo } from "../types";
import type { EntityType } from "./entity-type";
import type { ServiceParameterBinding } from "../parameter-binding";
import type { InternalServicePropertyBuilder } from "./internal-service-property-builder";

/**
 * A member bound to a framework-provided service instead of stored data.
 */
export class ServiceProperty extends Annotatable {
  builder: InternalServicePropertyBuilder | undefined;

  parameterBinding: ServiceParameterBinding | undefined;
  parameterBindingConfigurationSource: ConfigurationSource | undefined;

  constructor(
    readonly name: string,
    readonly declaringEntityType: EntityType,
    readonly clrType: Function,
    readonly memberInfo: MemberInfo,
    public configurationSource: ConfigurationSource
  ) {
    super();
  }

  get isInModel(): boolean {
    return this.builder !== undefined;
  }

  updateConfigurationSource(configurationSource: ConfigurationSource): void {
    this.configurationSource = max(this.configurationSource, configurationSource) ?? configurationSource;
  }
}
