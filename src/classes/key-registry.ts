import { type KeyDefinition, type FieldValue } from '../types/key.js';
import { DuplicateKeyError, UnknownKeyError, InvalidFieldValueError, ValidationError } from '../pipeline-errors.js';
import { escapeRegExp } from '../algorithms/template-pattern.js';

const KEY_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const FORMAT_SPEC_REGEX = /^0([1-9][0-9]*)$/;
const ALPHANUM_REGEX = /^[A-Za-z0-9]+$/;

/**
 * Registry of the typed placeholders templates are built from.
 * Definitions are immutable once registered.
 */
export class KeyRegistryClass {
    private keys = new Map<string, Readonly<KeyDefinition>>();

    /** field name -> key name */
    private fields = new Map<string, string>();

    /**
     * Registers a key. Registering an identical definition again is a no-op.
     * @throws DuplicateKeyError when the name or field name is taken by a different definition.
     */
    registerKey(definition: KeyDefinition): Readonly<KeyDefinition> {
        const key = normalizeDefinition(definition);

        const existing = this.keys.get(key.name);
        if (existing !== undefined) {
            if (canonical(existing) === canonical(key)) return existing;
            throw new DuplicateKeyError(key.name);
        }

        const field = key.alias ?? key.name;
        if (this.fields.has(field)) {
            throw new DuplicateKeyError(field);
        }

        if (key.choices !== undefined) Object.freeze(key.choices);
        const frozen: Readonly<KeyDefinition> = Object.freeze(key);
        this.keys.set(key.name, frozen);
        this.fields.set(field, key.name);
        return frozen;
    }

    has(name: string): boolean {
        return this.keys.has(name);
    }

    get(name: string): Readonly<KeyDefinition> {
        const key = this.keys.get(name);
        if (key === undefined) throw new UnknownKeyError(name);
        return key;
    }

    list(): Readonly<KeyDefinition>[] {
        return [...this.keys.values()];
    }

    /** Name under which values of this key are passed around: its alias, or its name. */
    fieldName(name: string): string {
        const key = this.get(name);
        return key.alias ?? key.name;
    }

    keyForField(field: string): Readonly<KeyDefinition> | undefined {
        const name = this.fields.get(field);
        return name !== undefined ? this.keys.get(name) : undefined;
    }

    /**
     * Checks a value against the key's type and choices.
     * @throws InvalidFieldValueError
     */
    validate(name: string, value: unknown): FieldValue {
        return checkValue(this.get(name), value);
    }

    /**
     * Renders a value. Int keys with a `0N` format spec are zero-padded to width N.
     */
    format(name: string, value: unknown): string {
        const key = this.get(name);
        const checked = this.validate(name, value);
        const width = padWidth(key);
        return width > 0 ? String(checked).padStart(width, '0') : String(checked);
    }

    /**
     * Inverse of {@link format}. The parsed value must format back to `text` exactly.
     * @throws InvalidFieldValueError
     */
    parse(name: string, text: string): FieldValue {
        const key = this.get(name);
        const field = key.alias ?? key.name;

        let value: FieldValue = text;
        if (key.type === 'int') {
            if (!/^\d+$/.test(text)) {
                throw new InvalidFieldValueError(field, text, 'expected digits');
            }
            value = parseInt(text, 10);
        }

        const formatted = this.format(name, value);
        if (formatted !== text) {
            throw new InvalidFieldValueError(field, text, `formats as '${formatted}'`);
        }
        return value;
    }

    /**
     * Regular expression source matching any formatted value of the key.
     * Contains no capturing groups.
     */
    pattern(name: string): string {
        const key = this.get(name);
        if (key.choices !== undefined) {
            const options = key.choices
                .map(choice => this.format(name, choice))
                .sort((a, b) => b.length - a.length)
                .map(escapeRegExp);
            return `(?:${options.join('|')})`;
        }
        switch (key.type) {
            case 'int': {
                const width = padWidth(key);
                return width > 0 ? `\\d{${String(width)},}` : '\\d+';
            }
            case 'alphanum':
                return '[A-Za-z0-9]+';
            case 'str':
                return '[^/\\\\]+';
        }
    }
}

function checkValue(key: KeyDefinition, value: unknown): FieldValue {
    const field = key.alias ?? key.name;

    let checked: FieldValue;
    switch (key.type) {
        case 'int':
            if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
                throw new InvalidFieldValueError(field, value, 'expected a non-negative integer');
            }
            checked = value;
            break;
        case 'alphanum':
            if (typeof value !== 'string' || !ALPHANUM_REGEX.test(value)) {
                throw new InvalidFieldValueError(field, value, 'expected ASCII letters and digits only');
            }
            checked = value;
            break;
        case 'str':
            if (typeof value !== 'string' || value === '') {
                throw new InvalidFieldValueError(field, value, 'expected a non-empty string');
            }
            if (/[/\\]/.test(value)) {
                throw new InvalidFieldValueError(field, value, 'must not contain a path separator');
            }
            if (value === '.' || value === '..') {
                throw new InvalidFieldValueError(field, value, 'must not be a relative path segment');
            }
            checked = value;
            break;
    }

    if (key.choices !== undefined && !key.choices.includes(checked)) {
        throw new InvalidFieldValueError(
            field,
            value,
            `expected one of ${key.choices.map(choice => String(choice)).join(', ')}`,
        );
    }
    return checked;
}

function padWidth(key: KeyDefinition): number {
    if (key.formatSpec === undefined) return 0;
    const match = FORMAT_SPEC_REGEX.exec(key.formatSpec);
    return match !== null ? parseInt(match[1], 10) : 0;
}

function normalizeDefinition(definition: KeyDefinition): KeyDefinition {
    const invalid = (reason: string): ValidationError =>
        new ValidationError(`Invalid key '${definition.name}': ${reason}.`, { keyName: definition.name, reason });

    if (!KEY_NAME_REGEX.test(definition.name)) throw invalid('name must be an identifier');
    if (definition.alias !== undefined && !KEY_NAME_REGEX.test(definition.alias)) {
        throw invalid('alias must be an identifier');
    }
    if (definition.formatSpec !== undefined) {
        if (definition.type !== 'int') throw invalid('format specs apply to int keys only');
        if (!FORMAT_SPEC_REGEX.test(definition.formatSpec)) {
            throw invalid(`unsupported format spec '${definition.formatSpec}', expected 0N`);
        }
    }
    if (definition.choices !== undefined && definition.choices.length === 0) {
        throw invalid('choices must not be empty');
    }
    if (definition.abstractToken === '') throw invalid('abstract token must not be empty');

    const key: KeyDefinition = { name: definition.name, type: definition.type };
    if (definition.formatSpec !== undefined) key.formatSpec = definition.formatSpec;
    if (definition.alias !== undefined) key.alias = definition.alias;
    if (definition.default !== undefined) key.default = definition.default;
    if (definition.choices !== undefined) key.choices = [...definition.choices];
    if (definition.abstractToken !== undefined) key.abstractToken = definition.abstractToken;

    const values: Array<[string, FieldValue]> = (key.choices ?? []).map((choice): [string, FieldValue] => ['choice', choice]);
    if (key.default !== undefined) values.push(['default', key.default]);
    for (const [what, value] of values) {
        try {
            checkValue({ ...key, choices: what === 'choice' ? undefined : key.choices }, value);
        } catch (e) {
            if (e instanceof InvalidFieldValueError) {
                throw invalid(`${what} ${JSON.stringify(value)} is not valid (${String(e.context.reason)})`);
            }
            throw e;
        }
    }
    return key;
}

function canonical(key: KeyDefinition): string {
    return JSON.stringify([key.name, key.type, key.formatSpec, key.alias, key.default, key.choices, key.abstractToken]);
}
