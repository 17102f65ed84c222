/**
 * Placeholder key types used inside templates.
 */

/** Semantic type of a key: free string, integer, or ASCII letters and digits only. */
export type KeyType = 'str' | 'int' | 'alphanum';

/** A concrete value for a template field. Integers for `int` keys, strings otherwise. */
export type FieldValue = string | number;

/** Field values keyed by field name (the key's alias, or its name). */
export type Fields = Record<string, FieldValue>;

/**
 * Definition of a named, typed placeholder.
 */
export interface KeyDefinition {
    name: string;
    type: KeyType;
    /** Zero-padding spec for int keys, e.g. `03` renders 7 as `007`. */
    formatSpec?: string;
    /** Field name used when resolving and extracting, in place of `name`. */
    alias?: string;
    /** Value used when a resolve call does not supply one. */
    default?: FieldValue;
    /** Restricts values to this list. */
    choices?: FieldValue[];
    /** Token rendered by abstract resolution when no value is given, e.g. `<UDIM>`. */
    abstractToken?: string;
}
