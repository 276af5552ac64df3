/** Prefix that marks a worker as a one-shot polecat. */
export const POLECAT_PREFIX = 'polecat_';

export const POLECAT_NAMES: readonly string[] = [
  'emma', 'olivia', 'ava', 'sophia', 'mia', 'charlotte',
  'amelia', 'harper', 'evelyn', 'abigail', 'ella', 'scarlett',
  'grace', 'chloe', 'lily', 'zoe', 'maya', 'lucy',
  'isabella', 'aria', 'aurora', 'violet', 'nova', 'hazel',
];

export function isPolecat(name: string): boolean {
  return name.startsWith(POLECAT_PREFIX);
}

export function polecatBaseName(name: string): string | null {
  return isPolecat(name) ? name.slice(POLECAT_PREFIX.length) : null;
}

function pick(names: readonly string[], random: () => number): string {
  return names[Math.floor(random() * names.length) % names.length];
}

/**
 * Pick an unused polecat name. When every pool name is taken, any pool
 * name is returned and the caller has to deal with the path collision.
 */
export function generatePolecatName(
  used: Iterable<string>,
  random: () => number = Math.random,
  pool: readonly string[] = POLECAT_NAMES,
): string {
  const taken = new Set<string>();
  for (const name of used) {
    const base = polecatBaseName(name);
    if (base !== null) taken.add(base);
  }

  const available = pool.filter((name) => !taken.has(name));
  const base = available.length > 0 ? pick(available, random) : pick(pool, random);
  return `${POLECAT_PREFIX}${base}`;
}
