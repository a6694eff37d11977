import { ConfigurationSource } from "./configuration-source";

export interface Annotation {
  readonly name: string;
  readonly value: unknown;
  readonly configurationSource: ConfigurationSource;
}

/**
 * Base for every metadata object that can carry annotations.
 * Annotations are mutated through builders, which raise the change events.
 */
export class Annotatable {
  private readonly annotationMap = new Map<string, Annotation>();

  findAnnotation(name: string): Annotation | undefined {
    return this.annotationMap.get(name);
  }

  getAnnotations(): Annotation[] {
    return [...this.annotationMap.values()];
  }

  /** @internal */
  setAnnotation(
    name: string,
    value: unknown,
    configurationSource: ConfigurationSource
  ): Annotation {
    const annotation: Annotation = { name, value, configurationSource };
    this.annotationMap.set(name, annotation);
    return annotation;
  }

  /** @internal */
  removeAnnotation(name: string): Annotation | undefined {
    const existing = this.annotationMap.get(name);
    this.annotationMap.delete(name);
    return existing;
  }
}
