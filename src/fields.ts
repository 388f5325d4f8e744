import { EXCLUDE_TAG, FieldDefinition, StructDescriptor, TypeDescriptor } from "./types";

/**
 * One struct field, resolved against a tag name.
 */
export interface FieldDescriptor {
  readonly name: string;
  /** Tag value for the active tag name, undefined if the field has none */
  readonly tag: string | undefined;
  /** Position in declaration order */
  readonly index: number;
  readonly type: TypeDescriptor;
  get(target: object): unknown;
  set(target: object, value: unknown): void;
}

interface FieldTable {
  all: readonly FieldDescriptor[];
  tagged: readonly FieldDescriptor[];
}

// Keyed by descriptor identity, then tag name. Entries never change once set.
const tables = new WeakMap<StructDescriptor, Map<string, FieldTable>>();

/**
 * Looks up a field's tag for the given tag name.
 */
export function lookupTag(field: FieldDefinition, tagName: string): string | undefined {
  return Object.hasOwn(field.tags, tagName) ? field.tags[tagName] : undefined;
}

/**
 * Field inclusion rule, shared by encode and decode.
 *
 * Outside only-tagged mode every field is included, "-" tags too. In
 * only-tagged mode a field needs a tag that is neither empty nor "-".
 */
export function isIncluded(tag: string | undefined, onlyTagged: boolean): boolean {
  if (!onlyTagged) {
    return true;
  }
  return tag !== undefined && tag !== "" && tag !== EXCLUDE_TAG;
}

function buildTable(type: StructDescriptor, tagName: string): FieldTable {
  const all = type.fields.map((def, index): FieldDescriptor => {
    const name = def.name;
    return Object.freeze({
      name,
      tag: lookupTag(def, tagName),
      index,
      type: def.type,
      get: (target: object): unknown => Reflect.get(target, name),
      set: (target: object, value: unknown): void => {
        Reflect.set(target, name, value);
      },
    });
  });
  return {
    all: Object.freeze(all),
    tagged: Object.freeze(all.filter((f) => isIncluded(f.tag, true))),
  };
}

function tableFor(type: StructDescriptor, tagName: string): FieldTable {
  let byTag = tables.get(type);
  if (byTag === undefined) {
    byTag = new Map();
    tables.set(type, byTag);
  }
  let table = byTag.get(tagName);
  if (table === undefined) {
    table = buildTable(type, tagName);
    byTag.set(tagName, table);
  }
  return table;
}

/**
 * Returns every field of a struct with its tag for tagName resolved,
 * in declaration order.
 */
export function resolveFields(type: StructDescriptor, tagName: string): readonly FieldDescriptor[] {
  return tableFor(type, tagName).all;
}

/**
 * Returns the fields a session with the given tag name and mode reads or
 * writes, in declaration order.
 */
export function includedFields(
  type: StructDescriptor,
  tagName: string,
  onlyTagged: boolean
): readonly FieldDescriptor[] {
  const table = tableFor(type, tagName);
  return onlyTagged ? table.tagged : table.all;
}
