/**
 * Make column names unique by suffixing repeats with `_2`, `_3`, ...
 * Blank names become `<prefix><index>`. Calls `onRenamed` for each change.
 */
export function uniqueColumnNames(
  names: readonly string[],
  prefix: string,
  onRenamed?: (original: string, renamed: string) => void,
): string[] {
  const taken = new Set<string>();
  return names.map((raw, index) => {
    const base = raw.trim() === '' ? `${prefix}${index}` : raw;
    let name = base;
    for (let n = 2; taken.has(name); n++) {
      name = `${base}_${n}`;
    }
    taken.add(name);
    if (name !== raw) onRenamed?.(raw, name);
    return name;
  });
}
