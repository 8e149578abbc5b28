/**
 * ISpecificationProvider Interface
 *
 * Port for loading the desired-state description of an environment.
 *
 * @module packages/core/ports/specification-provider
 */

/**
 * Dependency lists of an environment description.
 * Keys other than conda and pip are not part of the comparison.
 */
export interface EnvironmentDependencies {
  conda: string[];
  pip: string[];
}

/**
 * A loaded environment description
 */
export interface EnvironmentSpec {
  /** Environment name declared by the file, if any */
  name?: string;
  /** Channels declared by the file */
  channels: string[];
  dependencies: EnvironmentDependencies;
  /** Resolved path or URL the description was read from */
  source: string;
}

export interface SpecificationLoadOptions {
  /** Target environment name, when given on the command line */
  name?: string;
}

/**
 * Loads environment descriptions from a path or URL.
 */
export interface ISpecificationProvider {
  /**
   * @throws SpecNotFoundError if the source cannot be located or read
   * @throws EnvironmentFileError if the content is not a valid description
   */
  load(file: string, options?: SpecificationLoadOptions): Promise<EnvironmentSpec>;
}

/**
 * The specification list compared against an inventory: conda entries
 * followed by pip entries, each in file order.
 */
export function specificationEntries(spec: EnvironmentSpec): string[] {
  return [...spec.dependencies.conda, ...spec.dependencies.pip];
}
