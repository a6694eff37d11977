import type { Key } from "./key";
import type { InternalModelBuilder } from "./internal-model-builder";

export class InternalKeyBuilder {
  constructor(
    readonly metadata: Key,
    readonly modelBuilder: InternalModelBuilder
  ) {
    metadata.builder = this;
  }

  get isInModel(): boolean {
    return this.metadata.builder === this;
  }
}
