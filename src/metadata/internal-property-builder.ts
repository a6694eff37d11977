import { ConfigurationSource, max, overrides } from "./configuration-source";
import type { Property } from "./property";
import type { InternalModelBuilder } from "./internal-model-builder";
import type { ValueGenerated } from "../types";

export class InternalPropertyBuilder {
  constructor(
    readonly metadata: Property,
    readonly modelBuilder: InternalModelBuilder
  ) {
    metadata.builder = this;
  }

  get isInModel(): boolean {
    return this.metadata.builder === this;
  }

  /**
   * Set how the store produces the value. `undefined` resets to `'never'`
   * and forgets the source, so any later setter wins.
   */
  valueGenerated(
    valueGenerated: ValueGenerated | undefined,
    configurationSource: ConfigurationSource
  ): InternalPropertyBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const property = this.metadata;
    if (valueGenerated !== undefined && property.valueGenerated === valueGenerated) {
      property.valueGeneratedConfigurationSource = max(
        property.valueGeneratedConfigurationSource,
        configurationSource
      );
      return this;
    }
    if (!overrides(configurationSource, property.valueGeneratedConfigurationSource)) {
      return undefined;
    }

    if (valueGenerated === undefined) {
      property.valueGenerated = "never";
      property.valueGeneratedConfigurationSource = undefined;
    } else {
      property.valueGenerated = valueGenerated;
      property.valueGeneratedConfigurationSource = max(
        property.valueGeneratedConfigurationSource,
        configurationSource
      );
    }
    return this;
  }

  isNullable(nullable: boolean, configurationSource: ConfigurationSource): InternalPropertyBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const property = this.metadata;
    if (property.isNullable !== nullable && !overrides(configurationSource, property.isNullableConfigurationSource)) {
      return undefined;
    }
    property.isNullable = nullable;
    property.isNullableConfigurationSource = max(property.isNullableConfigurationSource, configurationSource);
    return this;
  }

  hasAnnotation(
    name: string,
    value: unknown,
    configurationSource: ConfigurationSource
  ): InternalPropertyBuilder | undefined {
    if (!this.isInModel) {
      return undefined;
    }
    this.modelBuilder.assertMutable();

    const property = this.metadata;
    const existing = property.findAnnotation(name);
    if (existing && existing.value !== value && !overrides(configurationSource, existing.configurationSource)) {
      return undefined;
    }
    if (value === undefined) {
      property.removeAnnotation(name);
    } else {
      property.setAnnotation(name, value, max(existing?.configurationSource, configurationSource) ?? configurationSource);
    }
    return this;
  }
}
