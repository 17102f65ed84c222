import { type TemplateToken, type FlatToken } from '../types/template.js';
import { ValidationError } from '../pipeline-errors.js';

const KEY_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INCLUDE_NAME_REGEX = /^[A-Za-z0-9_]+/;

/**
 * Splits a template definition into literal, `{key}`, `[optional]` and
 * `@include` tokens.
 *
 * - `{key}` references a registered key by name.
 * - `@name` includes another template; only at the start of the definition
 *   or directly after a `/`. Elsewhere `@` is literal text.
 * - `[...]` is an optional section: it is dropped on resolution when any key
 *   inside it has no value. Sections do not nest and cannot span a `/`.
 *
 * @param definition The template definition, e.g. `"@asset_root/publish/{name}.v{version}.spp"`.
 * @returns The token sequence, adjacent literals merged.
 */
export function tokenizeTemplate(definition: string): TemplateToken[] {
    const tokens: TemplateToken[] = [];
    let optional: TemplateToken[] | null = null;
    let literal = '';

    const target = (): TemplateToken[] => optional ?? tokens;
    const flush = (): void => {
        if (literal !== '') {
            target().push({ kind: 'literal', text: literal });
            literal = '';
        }
    };
    const invalid = (reason: string): ValidationError =>
        new ValidationError(`Invalid template definition '${definition}': ${reason}.`, { definition, reason });

    let i = 0;
    while (i < definition.length) {
        const ch = definition[i];

        if (ch === '{') {
            const close = definition.indexOf('}', i);
            if (close < 0) throw invalid(`unclosed '{' at ${String(i)}`);
            const name = definition.slice(i + 1, close);
            if (!KEY_NAME_REGEX.test(name)) throw invalid(`invalid key name '${name}'`);
            flush();
            target().push({ kind: 'key', name });
            i = close + 1;
            continue;
        }

        if (ch === '}') throw invalid(`unexpected '}' at ${String(i)}`);

        if (ch === '@' && (i === 0 || definition[i - 1] === '/')) {
            const match = INCLUDE_NAME_REGEX.exec(definition.slice(i + 1));
            if (match === null) throw invalid(`'@' at ${String(i)} is not followed by a template name`);
            if (optional !== null) throw invalid('includes are not allowed inside optional sections');
            flush();
            tokens.push({ kind: 'include', template: match[0] });
            i += 1 + match[0].length;
            continue;
        }

        if (ch === '[') {
            if (optional !== null) throw invalid('optional sections cannot nest');
            flush();
            optional = [];
            i++;
            continue;
        }

        if (ch === ']') {
            if (optional === null) throw invalid(`unexpected ']' at ${String(i)}`);
            flush();
            const section = optional;
            if (!section.some(t => t.kind === 'key')) throw invalid('optional section without a key');
            optional = null;
            tokens.push({ kind: 'optional', tokens: section });
            i++;
            continue;
        }

        if (ch === '/' && optional !== null) throw invalid("optional sections cannot contain '/'");

        literal += ch;
        i++;
    }

    if (optional !== null) throw invalid("unclosed '['");
    flush();
    return tokens;
}

/**
 * Writes a flattened token sequence back out as a definition string.
 */
export function tokensToDefinition(tokens: FlatToken[]): string {
    return tokens
        .map(token => {
            switch (token.kind) {
                case 'literal':
                    return token.text;
                case 'key':
                    return `{${token.name}}`;
                case 'optional':
                    return `[${tokensToDefinition(token.tokens)}]`;
            }
        })
        .join('');
}

/**
 * Merges adjacent literal tokens.
 */
export function mergeLiterals(tokens: FlatToken[]): FlatToken[] {
    const merged: FlatToken[] = [];
    for (const token of tokens) {
        const last = merged[merged.length - 1];
        if (token.kind === 'literal' && last !== undefined && last.kind === 'literal') {
            merged[merged.length - 1] = { kind: 'literal', text: last.text + token.text };
        } else if (token.kind === 'optional') {
            merged.push({ kind: 'optional', tokens: mergeLiterals(token.tokens) });
        } else {
            merged.push(token);
        }
    }
    return merged.filter(token => token.kind !== 'literal' || token.text !== '');
}

/**
 * Splits a flattened token sequence into `/`-separated path segments.
 * Optional sections never contain `/`, so they stay whole.
 */
export function splitSegments(tokens: FlatToken[]): FlatToken[][] {
    const segments: FlatToken[][] = [[]];
    for (const token of tokens) {
        if (token.kind !== 'literal') {
            segments[segments.length - 1].push(token);
            continue;
        }
        const parts = token.text.split('/');
        parts.forEach((part, index) => {
            if (index > 0) segments.push([]);
            if (part !== '') segments[segments.length - 1].push({ kind: 'literal', text: part });
        });
    }
    return segments;
}

/**
 * Collects key names in order of first appearance.
 * @param includeOptional Whether keys inside optional sections are included.
 */
export function collectKeys(tokens: FlatToken[], includeOptional = true): string[] {
    const keys: string[] = [];
    const visit = (list: FlatToken[]): void => {
        for (const token of list) {
            if (token.kind === 'key' && !keys.includes(token.name)) keys.push(token.name);
            if (token.kind === 'optional' && includeOptional) visit(token.tokens);
        }
    };
    visit(tokens);
    return keys;
}

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
