/**
 * Parsed template structure.
 */

/**
 * One piece of a template definition.
 * `include` tokens only exist before flattening.
 */
export type TemplateToken =
    | { kind: 'literal'; text: string }
    | { kind: 'key'; name: string }
    | { kind: 'optional'; tokens: TemplateToken[] }
    | { kind: 'include'; template: string };

/** A token after includes have been flattened away. */
export type FlatToken =
    | { kind: 'literal'; text: string }
    | { kind: 'key'; name: string }
    | { kind: 'optional'; tokens: FlatToken[] };

/**
 * A registered template: its original definition plus the flattened token sequence.
 */
export interface TemplateInfo {
    name: string;
    /** Definition as registered, includes unexpanded. */
    definition: string;
    /** Definition with every include expanded. */
    expanded: string;
    /** Key names referenced, in order of first appearance. */
    keys: string[];
    /** Field names (key aliases or names), in order of first appearance. */
    fields: string[];
    /** Field names outside optional sections. */
    requiredFields: string[];
}
