export type LiteralToken = { kind: "literal"; text: string };

export type MetadataKeyToken = { kind: "key"; name: string };

export type SchemeToken = LiteralToken | MetadataKeyToken;

/** Ordered tokens; concatenated left to right. */
export type Scheme = readonly SchemeToken[];

export type MetadataValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | readonly (string | number)[]
  | Uint8Array
  | Record<string, unknown>
  | null
  | undefined;

export type Metadata = Record<string, MetadataValue>;

/** Original path => bare new filename (never a directory component). */
export type RenamePlan = Map<string, string>;

/** A plan as handed to the executor, possibly read back from JSON. */
export type RenamePlanInput = ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>;
