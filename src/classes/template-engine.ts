import * as path from 'path';
import { type FieldValue, type Fields } from '../types/key.js';
import { type FlatToken, type TemplateInfo, type TemplateToken } from '../types/template.js';
import {
    tokenizeTemplate,
    tokensToDefinition,
    mergeLiterals,
    splitSegments,
    collectKeys,
    escapeRegExp,
} from '../algorithms/template-pattern.js';
import {
    CyclicTemplateError,
    InvalidFieldValueError,
    MissingFieldError,
    NoMatchError,
    UnknownKeyError,
    UnknownTemplateError,
    ValidationError,
} from '../pipeline-errors.js';
import { type KeyRegistryClass } from './key-registry.js';

const TEMPLATE_NAME_REGEX = /^[A-Za-z0-9_]+$/;

/** A template as written in configuration: a bare definition, or one relative to a base template. */
export type TemplateDefinition = string | { definition: string; base?: string | undefined };

/**
 * One path segment of a template, with some fields pinned.
 * Fully pinned segments are plain names; the rest are matched against directory entries.
 */
export type ScanSegment =
    | { kind: 'literal'; name: string }
    | { kind: 'pattern'; regex: RegExp };

export interface ScanPlan {
    /** Directory the walk starts from. */
    baseDir: string;
    segments: ScanSegment[];
}

export interface TemplateEngineOptions {
    /** Directory relative templates resolve against; a relative root is taken from the working directory. */
    root?: string;
}

interface CompiledTemplate {
    info: TemplateInfo;
    tokens: FlatToken[];
    absolute: boolean;
    regex: RegExp | null;
}

/**
 * Named path templates over a key registry.
 *
 * Includes are flattened when a template is registered, so resolution and
 * extraction only ever see literals, keys and optional sections.
 */
export class TemplateEngineClass {
    private templates = new Map<string, CompiledTemplate>();
    private readonly _keys: KeyRegistryClass;
    private readonly _root: string | undefined;

    constructor(keys: KeyRegistryClass, options: TemplateEngineOptions = {}) {
        this._keys = keys;
        this._root = options.root !== undefined ? path.resolve(options.root) : undefined;
    }

    get keys(): KeyRegistryClass {
        return this._keys;
    }

    get root(): string | undefined {
        return this._root;
    }

    // ------------------------------------------------------------------------
    // Registration
    // ------------------------------------------------------------------------

    /**
     * Registers a template. With a `base`, the definition is taken relative to
     * that template, as if written `@base/definition`.
     *
     * @throws UnknownKeyError, UnknownTemplateError, CyclicTemplateError (self include)
     */
    registerTemplate(name: string, definition: string, base?: string): TemplateInfo {
        if (!TEMPLATE_NAME_REGEX.test(name)) {
            throw new ValidationError(`Invalid template name '${name}'.`, { templateName: name });
        }
        if (this.templates.has(name)) {
            throw new ValidationError(`Template '${name}' is already registered.`, { templateName: name });
        }

        const tokens = mergeLiterals(this.flatten(name, tokenizeTemplate(effectiveDefinition(definition, base))));
        if (tokens.length === 0) {
            throw new ValidationError(`Template '${name}' is empty.`, { templateName: name });
        }

        const keys = collectKeys(tokens);
        for (const key of keys) {
            if (!this._keys.has(key)) throw new UnknownKeyError(key, name);
        }

        const expanded = tokensToDefinition(tokens);
        const info: TemplateInfo = Object.freeze({
            name,
            definition,
            expanded,
            keys,
            fields: keys.map(key => this._keys.fieldName(key)),
            requiredFields: collectKeys(tokens, false).map(key => this._keys.fieldName(key)),
        });

        this.templates.set(name, { info, tokens, absolute: path.isAbsolute(expanded), regex: null });
        return info;
    }

    /**
     * Registers a set of templates that may include each other, in dependency order.
     * Cycles are rejected before anything is registered.
     */
    registerTemplates(definitions: Record<string, TemplateDefinition>): TemplateInfo[] {
        const entries = new Map<string, { definition: string; base?: string | undefined }>();
        for (const [name, value] of Object.entries(definitions)) {
            entries.set(name, typeof value === 'string' ? { definition: value } : value);
        }

        const includes = new Map<string, string[]>();
        for (const [name, entry] of entries) {
            const tokens = tokenizeTemplate(effectiveDefinition(entry.definition, entry.base));
            includes.set(name, tokens.flatMap(token => (token.kind === 'include' && entries.has(token.template) ? [token.template] : [])));
        }

        const order: string[] = [];
        const state = new Map<string, 'visiting' | 'done'>();
        const stack: string[] = [];
        const visit = (name: string): void => {
            const current = state.get(name);
            if (current === 'done') return;
            if (current === 'visiting') {
                throw new CyclicTemplateError([...stack.slice(stack.indexOf(name)), name]);
            }
            state.set(name, 'visiting');
            stack.push(name);
            for (const dependency of includes.get(name) ?? []) visit(dependency);
            stack.pop();
            state.set(name, 'done');
            order.push(name);
        };
        for (const name of entries.keys()) visit(name);

        const registered: TemplateInfo[] = [];
        for (const name of order) {
            const entry = entries.get(name);
            if (entry !== undefined) registered.push(this.registerTemplate(name, entry.definition, entry.base));
        }
        return registered;
    }

    has(name: string): boolean {
        return this.templates.has(name);
    }

    template(name: string): TemplateInfo {
        return this.compiled(name).info;
    }

    listTemplates(): TemplateInfo[] {
        return [...this.templates.values()].map(compiled => compiled.info);
    }

    // ------------------------------------------------------------------------
    // Resolution
    // ------------------------------------------------------------------------

    /**
     * Renders a template into a path, joined to the root when the template is relative.
     * @throws MissingFieldError, InvalidFieldValueError
     */
    resolve(name: string, fields: Fields): string {
        const compiled = this.compiled(name);
        return this.toPath(compiled, this.render(compiled, fields, false));
    }

    /**
     * Like {@link resolve}, but a key with an abstract token renders the token
     * when no value is given, e.g. `hull_Normal_raw.<UDIM>.png`.
     */
    resolveAbstract(name: string, fields: Fields): string {
        const compiled = this.compiled(name);
        return this.toPath(compiled, this.render(compiled, fields, true));
    }

    /**
     * Parses a path back into field values. Inverse of {@link resolve}.
     * @throws NoMatchError
     */
    extract(name: string, filePath: string): Fields {
        const compiled = this.compiled(name);
        const relative = this.relativize(compiled, filePath);
        if (relative === null) throw new NoMatchError(name, filePath);

        const regex = (compiled.regex ??= this.buildRegex(compiled.tokens));
        const match = regex.exec(relative);
        if (match === null) throw new NoMatchError(name, filePath);

        const groups = match.groups ?? {};
        const fields: Fields = {};
        try {
            for (const key of compiled.info.keys) {
                const text = groups[key];
                if (text === undefined) continue;
                fields[this._keys.fieldName(key)] = this._keys.parse(key, text);
            }
            // repeated keys and greedy splits are only settled by rendering back
            if (this.render(compiled, fields, false) !== relative) throw new NoMatchError(name, filePath);
        } catch (e) {
            if (e instanceof InvalidFieldValueError || e instanceof MissingFieldError) {
                throw new NoMatchError(name, filePath);
            }
            throw e;
        }
        return fields;
    }

    /**
     * Checks a value for the key behind a field name.
     */
    validateField(field: string, value: unknown): FieldValue {
        const key = this._keys.keyForField(field);
        if (key === undefined) throw new UnknownKeyError(field);
        return this._keys.validate(key.name, value);
    }

    /**
     * Splits a template into path segments for a directory walk. Segments whose
     * keys are all pinned become plain names, the others regular expressions.
     * Pinned fields the template does not use are ignored.
     */
    scanPlan(name: string, pinned: Fields): ScanPlan {
        const compiled = this.compiled(name);
        const segments = splitSegments(compiled.tokens);

        const prefix: string[] = [];
        let index = 0;
        while (index < segments.length - 1 && segments[index].every(token => token.kind === 'literal')) {
            prefix.push(tokensToDefinition(segments[index]));
            index++;
        }
        const baseDir = compiled.absolute
            ? path.normalize(`${prefix.join('/')}/`)
            : path.join(this._root ?? '.', ...prefix);

        return {
            baseDir,
            segments: segments
                .slice(index)
                .filter(segment => segment.length > 0)
                .map(segment => this.segmentMatcher(segment, pinned)),
        };
    }

    // ------------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------------

    private compiled(name: string): CompiledTemplate {
        const compiled = this.templates.get(name);
        if (compiled === undefined) throw new UnknownTemplateError(name);
        return compiled;
    }

    private flatten(name: string, tokens: TemplateToken[]): FlatToken[] {
        const flat: FlatToken[] = [];
        tokens.forEach((token, index) => {
            switch (token.kind) {
                case 'literal':
                case 'key':
                    flat.push(token);
                    break;
                case 'optional':
                    flat.push({ kind: 'optional', tokens: this.flatten(name, token.tokens) });
                    break;
                case 'include': {
                    if (token.template === name) throw new CyclicTemplateError([name, name]);
                    const included = this.templates.get(token.template);
                    if (included === undefined) throw new UnknownTemplateError(token.template, name);
                    if (included.absolute && index > 0) {
                        throw new ValidationError(
                            `Template '${name}' includes absolute template '${token.template}' after a '/'.`,
                            { templateName: name, include: token.template },
                        );
                    }
                    flat.push(...included.tokens);
                    break;
                }
            }
        });
        return flat;
    }

    private render(compiled: CompiledTemplate, fields: Fields, abstract: boolean): string {
        const renderKey = (keyName: string, useDefault: boolean): string | undefined => {
            const key = this._keys.get(keyName);
            const field = key.alias ?? key.name;
            const value = Object.hasOwn(fields, field) ? fields[field] : useDefault ? key.default : undefined;
            if (value === undefined) return abstract ? key.abstractToken : undefined;
            return this._keys.format(keyName, value);
        };

        let out = '';
        for (const token of compiled.tokens) {
            switch (token.kind) {
                case 'literal':
                    out += token.text;
                    break;
                case 'key': {
                    const text = renderKey(token.name, true);
                    if (text === undefined) {
                        throw new MissingFieldError(compiled.info.name, this._keys.fieldName(token.name));
                    }
                    out += text;
                    break;
                }
                case 'optional': {
                    let section = '';
                    let complete = true;
                    for (const inner of token.tokens) {
                        if (inner.kind === 'literal') {
                            section += inner.text;
                        } else if (inner.kind === 'key') {
                            const text = renderKey(inner.name, false);
                            if (text === undefined) complete = false;
                            section += text ?? '';
                        }
                    }
                    if (complete) out += section;
                    break;
                }
            }
        }
        return out;
    }

    private toPath(compiled: CompiledTemplate, rendered: string): string {
        if (compiled.absolute) return rendered;
        const joined = this._root !== undefined ? path.join(this._root, rendered) : rendered;
        const relative = this._root !== undefined ? path.relative(this._root, joined) : path.normalize(rendered);
        // literal '..' segments can climb out of the root
        if (escapesRoot(relative)) {
            throw new ValidationError(
                `Template '${compiled.info.name}' resolves to '${rendered}', outside the root ${this._root ?? '.'}.`,
                { templateName: compiled.info.name, path: rendered, root: this._root },
            );
        }
        return joined;
    }

    /**
     * Path relative to the root, with `/` separators; null when it lies outside the root.
     */
    private relativize(compiled: CompiledTemplate, filePath: string): string | null {
        if (compiled.absolute || this._root === undefined) return toPosix(filePath);

        const relative = path.isAbsolute(filePath)
            ? path.relative(this._root, filePath)
            : path.normalize(filePath);
        if (relative === '' || escapesRoot(relative)) return null;
        return toPosix(relative);
    }

    private buildRegex(tokens: FlatToken[]): RegExp {
        const seen = new Set<string>();
        const source = (list: FlatToken[]): string =>
            list
                .map(token => {
                    switch (token.kind) {
                        case 'literal':
                            return escapeRegExp(token.text);
                        case 'key':
                            if (seen.has(token.name)) return `\\k<${token.name}>`;
                            seen.add(token.name);
                            return `(?<${token.name}>${this._keys.pattern(token.name)})`;
                        case 'optional':
                            return `(?:${source(token.tokens)})?`;
                    }
                })
                .join('');
        return new RegExp(`^${source(tokens)}$`);
    }

    private segmentMatcher(tokens: FlatToken[], pinned: Fields): ScanSegment {
        const pinnedValue = (keyName: string): FieldValue | undefined => {
            const field = this._keys.fieldName(keyName);
            return Object.hasOwn(pinned, field) ? pinned[field] : undefined;
        };

        const fixed = tokens.every(token =>
            token.kind === 'literal' || (token.kind === 'key' && pinnedValue(token.name) !== undefined));
        if (fixed) {
            const name = tokens
                .map(token => (token.kind === 'key' ? this._keys.format(token.name, pinnedValue(token.name)) : tokensToDefinition([token])))
                .join('');
            return { kind: 'literal', name };
        }

        const source = (list: FlatToken[]): string =>
            list
                .map(token => {
                    switch (token.kind) {
                        case 'literal':
                            return escapeRegExp(token.text);
                        case 'key': {
                            const value = pinnedValue(token.name);
                            return value !== undefined
                                ? escapeRegExp(this._keys.format(token.name, value))
                                : this._keys.pattern(token.name);
                        }
                        case 'optional':
                            return `(?:${source(token.tokens)})?`;
                    }
                })
                .join('');
        return { kind: 'pattern', regex: new RegExp(`^${source(tokens)}$`) };
    }
}

function effectiveDefinition(definition: string, base: string | undefined): string {
    return base !== undefined ? `@${base}/${definition.replace(/^\/+/, '')}` : definition;
}

function escapesRoot(relative: string): boolean {
    return relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

function toPosix(filePath: string): string {
    return filePath.split(path.sep).join('/');
}
