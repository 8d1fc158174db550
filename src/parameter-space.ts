/**
 * Cartesian parameter spaces for combinatorial tests.
 *
 *   const names = cartesianSet('Names', 'Alice', 'Bob', 'Charlie');
 *   const ages = cartesianSet('Ages', 8, 21, 50);
 *   const people = cartesianSpace(names, ages);
 *
 * Expanding `people` yields ['Alice', 8], ['Bob', 8], ['Charlie', 8],
 * ['Alice', 21], ... ['Charlie', 50]: the first set varies fastest.
 */

/** One named axis of a parameter space. */
export interface CartesianSet<V> {
  readonly name: string;
  readonly values: readonly V[];
}

export type ParameterSpace = readonly CartesianSet<unknown>[];

/** One value from each set of the space, in axis order. */
export type ProductSet<S extends ParameterSpace> = {
  readonly [K in keyof S]: S[K] extends CartesianSet<infer V> ? V : never;
};

export function cartesianSet<V>(name: string, ...values: V[]): CartesianSet<V> {
  return { name, values };
}

export function cartesianSpace<S extends ParameterSpace>(...sets: S): S {
  return sets;
}

function isProductSet<S extends ParameterSpace>(
  space: S,
  values: readonly unknown[]
): values is readonly unknown[] & ProductSet<S> {
  return values.length === space.length;
}

/**
 * Cursor over every combination of a parameter space, one index per axis.
 * Callers must `reset()` after `advance()` has returned false.
 */
export class ParameterSpaceExpander<S extends ParameterSpace> {
  private readonly sizes: number[];
  private readonly state: number[];
  private iteration = 0;

  constructor(readonly space: S) {
    this.sizes = space.map((set) => set.values.length);
    this.state = space.map(() => 0);
  }

  /** Number of combinations; 0 when any axis is empty. */
  get size(): number {
    return this.sizes.reduce((product, n) => product * n, 1);
  }

  get indices(): number[] {
    return this.state.slice();
  }

  /** Throws when the space has no combinations. */
  currentCombination(): ProductSet<S> {
    if (this.size === 0) {
      throw new RangeError('Parameter space has an empty axis and no combinations');
    }
    const values = this.space.map((set, i) => set.values[this.state[i]]);
    if (!isProductSet(this.space, values)) {
      throw new Error(`Combination has ${values.length} values for ${this.space.length} axes`);
    }
    return values;
  }

  /**
   * Steps to the next combination, carrying from each axis into the next.
   * Returns false once every axis has wrapped around.
   */
  advance(): boolean {
    this.iteration++;
    for (let i = 0; i < this.state.length; i++) {
      this.state[i]++;
      if (this.state[i] < this.sizes[i]) return true;
      this.state[i] = 0;
    }
    return false;
  }

  reset(): void {
    this.state.fill(0);
    this.iteration = 0;
  }

  /** Number of `advance()` calls since the last reset. */
  iterationOrdinal(): number {
    return this.iteration;
  }

  /** `_<axis>[<index>]` for every axis, e.g. `_Size[0]_Color[1]`. */
  formatSuffix(): string {
    return this.space.map((set, i) => `_${set.name}[${this.state[i]}]`).join('');
  }
}
