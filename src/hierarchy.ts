/**
 * Order symbols so that every ancestor comes before its descendants.
 */

export interface TopologicalOrder {
  /** Every name exactly once, ancestors first, otherwise in the given order. */
  sorted: string[];
  /** Each cycle as the path which closes it, e.g. `["A", "B", "A"]`. */
  cycles: string[][];
}

/**
 * Depth-first topological sort. Parents which are not among `names` are
 * skipped; reporting them is up to the caller.
 */
export function sortTopologically(
  names: readonly string[],
  parentsOf: (name: string) => readonly string[]
): TopologicalOrder {
  const known = new Set(names);
  const done = new Set<string>();
  const path: string[] = [];

  const sorted: string[] = [];
  const cycles: string[][] = [];

  function visit(name: string): void {
    if (done.has(name)) return;

    const onPath = path.indexOf(name);
    if (onPath >= 0) {
      cycles.push([...path.slice(onPath), name]);
      return;
    }

    path.push(name);
    for (const parent of parentsOf(name)) {
      if (known.has(parent)) {
        visit(parent);
      }
    }
    path.pop();

    done.add(name);
    sorted.push(name);
  }

  for (const name of names) {
    visit(name);
  }

  return { sorted, cycles };
}
