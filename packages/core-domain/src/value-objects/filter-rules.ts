export interface FilterRules {
  readonly skipHidden: boolean;
  readonly skipExtensions: ReadonlySet<string>;
  readonly skipDirNames: ReadonlySet<string>;
}

export type FilterRulesInput = {
  skipHidden?: boolean;
  skipExtensions?: Iterable<string>;
  skipDirNames?: Iterable<string>;
};

export function normalizeExtension(raw: string): string {
  const ext = raw.trim();
  if (ext === '') return '';
  return ext.startsWith('.') ? ext : `.${ext}`;
}

/**
 * Builds the immutable rule set used for a whole run. Extensions gain a
 * leading dot when missing; blank entries are dropped.
 */
export function createFilterRules(input: FilterRulesInput = {}): FilterRules {
  const skipExtensions = new Set<string>();
  for (const raw of input.skipExtensions ?? []) {
    const ext = normalizeExtension(raw);
    if (ext !== '') skipExtensions.add(ext);
  }

  const skipDirNames = new Set<string>();
  for (const raw of input.skipDirNames ?? []) {
    const name = raw.trim();
    if (name !== '') skipDirNames.add(name);
  }

  return Object.freeze({
    skipHidden: input.skipHidden ?? true,
    skipExtensions,
    skipDirNames,
  });
}
