export type RegistryTarget = "npm" | "github" | "none";

export const DEPENDENCY_FIELDS = [
  "dependencies",
  "optionalDependencies",
  "peerDependencies",
  "devDependencies",
] as const;

export type DependencyField = (typeof DEPENDENCY_FIELDS)[number];

/** Fields whose internal references constrain publish order. */
export const RUNTIME_DEPENDENCY_FIELDS: readonly DependencyField[] = [
  "dependencies",
  "optionalDependencies",
  "peerDependencies",
];

/** A reference from one workspace package to another, in any dependency field. */
export type InternalRef = {
  field: DependencyField;
  name: string;
  range: string;
};

export type PackageDescriptor = Readonly<{
  name: string;
  version: string;
  /** Absolute package directory. */
  path: string;
  manifestPath: string;
  /** Internal runtime dependencies; dev dependencies never affect ordering. */
  internalDeps: ReadonlySet<string>;
  internalRefs: readonly InternalRef[];
  registryTarget: RegistryTarget;
  private: boolean;
}>;
