import { ConfigurationSource, max, overrides } from "./configuration-source";
import type { ServiceProperty } from "./service-property";
import type { InternalModelBuilder } from "./internal-model-builder";
import type { ServiceParameterBinding } from "../parameter-binding";

export class InternalServicePropertyBuilder {
  constructor(
    readonly metadata: ServiceProperty,
    readonly modelBuilder: InternalModelBuilder
  ) {
    metadata.builder = this;
  }

  get isInModel(): boolean {
    return this.metadata.builder === this;
  }

  hasParameterBinding(
    binding: ServiceParameterBinding | undefined,
    configurationSource: ConfigurationSource
  ): InternalServicePropertyBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const serviceProperty = this.metadata;
    if (
      serviceProperty.parameterBinding !== binding &&
      !overrides(configurationSource, serviceProperty.parameterBindingConfigurationSource)
    ) {
      return undefined;
    }
    serviceProperty.parameterBinding = binding;
    serviceProperty.parameterBindingConfigurationSource = max(
      serviceProperty.parameterBindingConfigurationSource,
      configurationSource
    );
    return this;
  }
}
