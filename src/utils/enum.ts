// utility to define enums with attached data, without boilerplate scattered around.

// export const kSyntheticPattern = defineEnum({
//    zeros: { value: "zeros", title: "All zeros" },
//    random: { value: "random", title: "Random data" },
// } as const);
//
// kSyntheticPattern.keys;                 // ("zeros" | "random")[]
// kSyntheticPattern.byKey.zeros.title;    // "All zeros"
// kSyntheticPattern.coerceByKey("nope");  // undefined
//
// export type SyntheticPatternKey = typeof kSyntheticPattern.$key;

type EnumValue = string | number;

// the input definition. requires at least a "value" field, can have any other fields.
type EnumDef = Record<string, { value: EnumValue } & Record<string, unknown>>;

type EnumKeyUnion<D extends EnumDef> = keyof D & string;
type EnumValueUnion<D extends EnumDef> = D[EnumKeyUnion<D>]["value"];
type EnumInfo<D extends EnumDef, K extends EnumKeyUnion<D>> = { key: K } & D[K];
type EnumInfoUnion<D extends EnumDef> = {
  [K in EnumKeyUnion<D>]: EnumInfo<D, K>;
}[EnumKeyUnion<D>];

export interface DefinedEnum<D extends EnumDef> {
  keys: EnumKeyUnion<D>[];
  infos: EnumInfoUnion<D>[];
  byKey: { [K in EnumKeyUnion<D>]: EnumInfo<D, K> };
  byValue: ReadonlyMap<EnumValue, EnumInfoUnion<D>>;
  isKey(k: unknown): k is EnumKeyUnion<D>;
  coerceByKey(k: unknown): EnumInfoUnion<D> | undefined;
  // phantom fields for type extraction
  $key: EnumKeyUnion<D>;
  $value: EnumValueUnion<D>;
  $info: EnumInfoUnion<D>;
}

export function defineEnum<const D extends EnumDef>(def: D): DefinedEnum<D> {
  const keys = Object.keys(def) as EnumKeyUnion<D>[];
  const infos = keys.map((k) => ({ key: k, ...def[k] })) as EnumInfoUnion<D>[];

  // key -> info, e.g. byKey.zeros.title
  const byKey = Object.fromEntries(keys.map((k, i) => [k, infos[i]])) as DefinedEnum<D>["byKey"];

  const byValue = new Map<EnumValue, EnumInfoUnion<D>>();
  keys.forEach((k, i) => {
    const v = def[k].value;
    if (byValue.has(v)) {
      throw new Error(`Duplicate enum value: ${String(v)}`);
    }
    byValue.set(v, infos[i]);
  });

  function isKey(k: unknown): k is EnumKeyUnion<D> {
    return typeof k === "string" && Object.prototype.hasOwnProperty.call(def, k);
  }

  return {
    keys,
    infos,
    byKey,
    byValue,
    isKey,
    coerceByKey: (k) => (isKey(k) ? byKey[k] : undefined),
    $key: null as unknown as EnumKeyUnion<D>,
    $value: null as unknown as EnumValueUnion<D>,
    $info: null as unknown as EnumInfoUnion<D>,
  };
}
