import { GraphCycleError, ManifestParseError, UnknownDependencyError } from "../errors.js";
import type { PackageDescriptor } from "../types/package.js";

type Color = "gray" | "black";

/**
 * Immutable DAG over workspace packages. An edge A → B means A depends on B.
 *
 * tier(p) = 0 without internal dependencies, otherwise 1 + max(tier(dep)),
 * so every dependency sits in a strictly lower tier than its dependents.
 */
export class DependencyGraph {
  private constructor(
    private readonly nodes: ReadonlyMap<string, PackageDescriptor>,
    private readonly tierByName: ReadonlyMap<string, number>,
  ) {}

  static build(descriptors: readonly PackageDescriptor[]): DependencyGraph {
    const nodes = new Map<string, PackageDescriptor>();
    for (const d of descriptors) {
      if (nodes.has(d.name)) throw new ManifestParseError(d.manifestPath, `duplicate package name ${d.name}`);
      nodes.set(d.name, d);
    }
    return new DependencyGraph(nodes, computeTiers(nodes));
  }

  /** Re-check acyclicity and that every dependency resolves. */
  validate(): void {
    computeTiers(this.nodes);
  }

  get size(): number {
    return this.nodes.size;
  }

  names(): string[] {
    return [...this.nodes.keys()].sort();
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  get(name: string): PackageDescriptor {
    const node = this.nodes.get(name);
    if (!node) throw new UnknownDependencyError("<graph>", name);
    return node;
  }

  descriptors(): PackageDescriptor[] {
    return this.names().map((n) => this.get(n));
  }

  tierOf(name: string): number {
    const tier = this.tierByName.get(name);
    if (tier === undefined) throw new UnknownDependencyError("<graph>", name);
    return tier;
  }

  /** Package names grouped by tier, ascending; names sorted within a tier. */
  tiers(): string[][] {
    const out: string[][] = [];
    for (const name of this.names()) {
      const tier = this.tierOf(name);
      while (out.length <= tier) out.push([]);
      out[tier].push(name);
    }
    return out;
  }

  /** Direct internal dependencies, sorted. */
  dependenciesOf(name: string): string[] {
    return [...this.get(name).internalDeps].sort();
  }

  /** Every package that depends on `name`, directly or transitively. */
  dependentsOf(name: string): Set<string> {
    const result = new Set<string>();
    const frontier = [name];
    let current: string | undefined;
    while ((current = frontier.pop()) !== undefined) {
      for (const node of this.nodes.values()) {
        if (node.internalDeps.has(current) && !result.has(node.name)) {
          result.add(node.name);
          frontier.push(node.name);
        }
      }
    }
    return result;
  }
}

function computeTiers(nodes: ReadonlyMap<string, PackageDescriptor>): Map<string, number> {
  const color = new Map<string, Color>();
  const tiers = new Map<string, number>();
  const stack: string[] = [];

  // Recursion depth is bounded by the package count: a gray node is never re-entered.
  const visit = (name: string): number => {
    const done = tiers.get(name);
    if (done !== undefined) return done;

    const node = nodes.get(name);
    if (!node) throw new Error(`unreachable: ${name} is not a graph node`);

    color.set(name, "gray");
    stack.push(name);

    let tier = 0;
    for (const dep of [...node.internalDeps].sort()) {
      if (!nodes.has(dep)) throw new UnknownDependencyError(name, dep);
      if (color.get(dep) === "gray") {
        throw new GraphCycleError(stack.slice(stack.indexOf(dep)));
      }
      tier = Math.max(tier, visit(dep) + 1);
    }

    stack.pop();
    color.set(name, "black");
    tiers.set(name, tier);
    return tier;
  };

  for (const name of [...nodes.keys()].sort()) visit(name);
  return tiers;
}
