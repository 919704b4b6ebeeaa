import { ArgumentError } from '../errors';
import type { Construct } from '../constructs/Construct';
import { ConstructResolver, Ref } from '../constructs/Lazy';

/**
 * Named constructs that may refer to each other (and to themselves) through
 * {@link Ref}. References resolve at call time, so definitions can be added
 * in any order.
 */
export class SchemaRegistry implements ConstructResolver {
  private readonly definitions = new Map<string, Construct>();
  private readonly recursion = new Map<string, boolean>();

  define(name: string, construct: Construct): this {
    if (this.definitions.has(name)) {
      throw new ArgumentError(`schema '${name}' is already defined`);
    }
    this.definitions.set(name, construct);
    this.recursion.clear();
    return this;
  }

  /** Reference to `name`, resolved when it is first used. */
  ref(name: string): Ref {
    return new Ref(this, name);
  }

  lookup(name: string): Construct | undefined {
    return this.definitions.get(name);
  }

  get(name: string): Construct {
    const construct = this.definitions.get(name);
    if (!construct) {
      throw new ArgumentError(`unknown schema '${name}'`);
    }
    return construct;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }

  /** Whether `name` can reach a reference to itself. */
  isRecursive(name: string): boolean {
    const cached = this.recursion.get(name);
    if (cached !== undefined) return cached;
    const root = this.definitions.get(name);
    const result = root !== undefined && reaches(root, this, name, new Set());
    this.recursion.set(name, result);
    return result;
  }
}

function reaches(node: Construct, registry: ConstructResolver, name: string, seen: Set<Construct>): boolean {
  if (seen.has(node)) return false;
  seen.add(node);
  if (node instanceof Ref) {
    if (node.registry === registry && node.name === name) return true;
    const target = node.registry.lookup(node.name);
    return target !== undefined && reaches(target, registry, name, seen);
  }
  return node.subconstructs.some(child => reaches(child, registry, name, seen));
}
