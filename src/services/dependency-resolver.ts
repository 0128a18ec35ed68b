/**
 * Dependency Resolver
 *
 * Orders tables parents-first from their foreign keys so that referenced rows
 * exist before the rows that point at them. Works level by level: each pass
 * takes, in catalog order, every table whose parents are already placed.
 */

import type { TableDescriptor } from '../types/migration-types';

export interface DependencyOrder {
  /** Every input table, parents before children */
  order: string[];
  /** Tables left in a reference cycle, appended to `order` in catalog order */
  cycles: string[];
  dependencies: Record<string, string[]>;
}

/**
 * Catalog spelling of each table, keyed case-insensitively like SQLite identifiers
 */
function catalogNames(names: readonly string[]): Map<string, string> {
  return new Map(names.map(name => [name.toLowerCase(), name]));
}

export function resolveDependencies(tables: readonly TableDescriptor[]): DependencyOrder {
  const names = tables.map(table => table.name);
  const known = catalogNames(names);
  const dependencies: Record<string, string[]> = {};

  for (const table of tables) {
    const parents: string[] = [];
    for (const foreignKey of table.foreignKeys) {
      const parent = known.get(foreignKey.referencedTable.toLowerCase());
      if (parent !== undefined && parent !== table.name && !parents.includes(parent)) {
        parents.push(parent);
      }
    }
    dependencies[table.name] = parents;
  }

  const order: string[] = [];
  const remaining = new Set(names);

  while (remaining.size > 0) {
    const currentLevel = names.filter(
      name => remaining.has(name) && dependencies[name].every(parent => !remaining.has(parent))
    );

    if (currentLevel.length === 0) {
      break;
    }

    for (const name of currentLevel) {
      order.push(name);
      remaining.delete(name);
    }
  }

  const cycles = names.filter(name => remaining.has(name));
  order.push(...cycles);

  return { order, cycles, dependencies };
}
