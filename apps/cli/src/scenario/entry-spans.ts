import type { SourceSpan } from "@multireceiver/resolver";

export type EntrySpans = ReadonlyMap<string, readonly SourceSpan[]>;

const skipString = (source: string, start: number): number => {
  let index = start + 1;
  while (index < source.length) {
    const char = source[index];
    if (char === "\\") {
      index += 2;
      continue;
    }
    if (char === '"') return index;
    index += 1;
  }
  return source.length;
};

/**
 * Offsets of the object entries in each top-level array of a JSON document,
 * keyed by the array's property name. `source` must already parse as JSON.
 */
export const locateEntries = (source: string, file: string): EntrySpans => {
  const spans = new Map<string, SourceSpan[]>();
  const containers: string[] = [];
  let lastString: string | undefined;
  let key: string | undefined;
  let entryStart = -1;

  for (let index = 0; index < source.length; index += 1) {
    const char = source[index];

    if (char === '"') {
      const end = skipString(source, index);
      lastString = source.slice(index + 1, end);
      index = end;
      continue;
    }

    if (char === ":" && containers.length === 1) {
      key = lastString;
      continue;
    }

    if (char === "{" || char === "[") {
      containers.push(char);
      if (char === "{" && containers.length === 3 && containers[1] === "[") {
        entryStart = index;
      }
      continue;
    }

    if (char === "}" || char === "]") {
      if (char === "}" && containers.length === 3 && entryStart >= 0 && key) {
        const entries = spans.get(key) ?? [];
        entries.push({ file, start: entryStart, end: index + 1 });
        spans.set(key, entries);
        entryStart = -1;
      }
      containers.pop();
    }
  }

  return spans;
};

/** Names the entry whose span is exactly `span`, as `key[index]`. */
export const labelEntries =
  (spans: EntrySpans) =>
  (span: SourceSpan): string | undefined => {
    for (const [key, entries] of spans) {
      const index = entries.findIndex(
        (entry) =>
          entry.file === span.file && entry.start === span.start && entry.end === span.end
      );
      if (index >= 0) return `${key}[${index}]`;
    }
    return undefined;
  };
