import { InvalidAttributeValueError } from "./errors.js";
import type { XmlElement } from "./events.js";

/**
 * Declarative attribute binding. Each entity kind describes its attributes
 * once as a field table; {@link bindAttributes} applies the same policy to
 * all of them:
 *
 * - an absent attribute takes the default of its kind without complaint;
 * - a present `id`/`int` attribute that does not parse aborts the load with
 *   {@link InvalidAttributeValueError};
 * - booleans are `true` only for the literal `"true"` and never fail.
 */
export type FieldKind = "text" | "id" | "int" | "bool";

interface FieldValues {
  text: string;
  id: number;
  int: number;
  bool: boolean;
}

export interface FieldSpec {
  /** Exact attribute name in the document. */
  readonly attribute: string;
  /** Property name on the bound record. */
  readonly field: string;
  readonly kind: FieldKind;
}

export type FieldTable = readonly FieldSpec[];

/** Record type produced by binding the given table. */
export type BoundFields<T extends FieldTable> = {
  -readonly [S in T[number] as S["field"]]: FieldValues[S["kind"]];
};

const I32_MIN = -(2 ** 31);
const I32_MAX = 2 ** 31 - 1;
const UNSIGNED_PATTERN = /^\+?\d+$/;
const SIGNED_PATTERN = /^[+-]?\d+$/;

interface Coercion<V> {
  readonly fallback: V;
  /** Returns `undefined` when the raw value is not a valid literal. */
  readonly coerce: (raw: string) => V | undefined;
}

const COERCIONS: { readonly [K in FieldKind]: Coercion<FieldValues[K]> } = {
  text: { fallback: "", coerce: (raw) => raw },
  id: {
    fallback: 0,
    coerce: (raw) => {
      if (!UNSIGNED_PATTERN.test(raw)) {
        return undefined;
      }
      const value = Number(raw);
      return Number.isSafeInteger(value) ? value : undefined;
    },
  },
  int: {
    fallback: 0,
    coerce: (raw) => {
      if (!SIGNED_PATTERN.test(raw)) {
        return undefined;
      }
      const value = Number(raw);
      return value >= I32_MIN && value <= I32_MAX ? value : undefined;
    },
  },
  bool: { fallback: false, coerce: (raw) => raw === "true" },
};

/** Parses an unsigned id the same way `id` attributes are parsed. */
export function parseUnsignedId(raw: string): number | undefined {
  return COERCIONS.id.coerce(raw);
}

/** Binds the attributes of {@link element} according to {@link table}. */
export function bindAttributes<T extends FieldTable>(element: XmlElement, table: T): BoundFields<T> {
  const record: Record<string, FieldValues[FieldKind]> = {};
  for (const spec of table) {
    const raw = element.attributes[spec.attribute];
    record[spec.field] = raw === undefined ? COERCIONS[spec.kind].fallback : coerceField(element.tag, spec, raw);
  }
  return record as BoundFields<T>;
}

function coerceField(tag: string, spec: FieldSpec, raw: string): FieldValues[FieldKind] {
  const value = COERCIONS[spec.kind].coerce(raw);
  if (value === undefined) {
    throw new InvalidAttributeValueError(tag, spec.field, raw);
  }
  return value;
}

function text<N extends string>(name: N) {
  return { attribute: name, field: name, kind: "text" } as const;
}

function id<N extends string>(name: N) {
  return { attribute: name, field: name, kind: "id" } as const;
}

function int<N extends string>(name: N) {
  return { attribute: name, field: name, kind: "int" } as const;
}

function bool<N extends string>(name: N) {
  return { attribute: name, field: name, kind: "bool" } as const;
}

export const ROOT_FIELDS = [text("owner"), text("date"), text("version")] as const;

export const LEXICAL_UNIT_FIELDS = [
  id("id"),
  text("name"),
  text("pos"),
  int("tagcount"),
  text("domain"),
  text("desc"),
  text("workstate"),
  text("source"),
  int("variant"),
] as const;

export const SYNSET_FIELDS = [
  id("id"),
  text("workstate"),
  int("split"),
  text("owner"),
  text("definition"),
  text("desc"),
  bool("abstract"),
] as const;

export const RELATION_TYPE_FIELDS = [
  id("id"),
  text("type"),
  id("reverse"),
  text("name"),
  text("description"),
  text("posstr"),
  text("display"),
  text("shortcut"),
  bool("autoreverse"),
  text("pwn"),
] as const;

export const RELATION_TYPE_TEST_FIELDS = [text("text"), text("pos")] as const;

/** Shared by `lexicalrelations` and `synsetrelations`. */
export const RELATION_FIELDS = [id("parent"), id("child"), id("relation"), bool("valid"), text("owner")] as const;
