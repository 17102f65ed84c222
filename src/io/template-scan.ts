import * as fs from 'fs/promises';
import * as path from 'path';
import { type Fields } from '../types/key.js';
import { type TemplateEngineClass } from '../classes/template-engine.js';
import { NoMatchError, isErrnoException } from '../pipeline-errors.js';

export interface TemplateMatch {
    path: string;
    fields: Fields;
}

/**
 * Finds the files and directories on disk that match a template.
 *
 * Walks segment by segment from the template's fixed prefix: pinned segments
 * are joined directly, the others matched against directory entries. Every
 * candidate is then fully extracted and must agree with `pinned`, so entries
 * that only share a prefix are dropped. Dotfiles are skipped.
 *
 * @returns Matches sorted by path. A missing directory yields no matches.
 */
export async function findPathsFromTemplate(
    engine: TemplateEngineClass,
    templateName: string,
    pinned: Fields = {},
): Promise<TemplateMatch[]> {
    const plan = engine.scanPlan(templateName, pinned);

    let candidates = [plan.baseDir];
    for (const segment of plan.segments) {
        const next: string[] = [];
        for (const dir of candidates) {
            if (segment.kind === 'literal') {
                next.push(path.join(dir, segment.name));
                continue;
            }
            for (const entry of await readDirectory(dir)) {
                if (!entry.startsWith('.') && segment.regex.test(entry)) next.push(path.join(dir, entry));
            }
        }
        candidates = next;
    }

    const info = engine.template(templateName);
    const pinnedFields = info.fields
        .filter(field => Object.hasOwn(pinned, field))
        .map(field => [field, engine.validateField(field, pinned[field])] as const);

    const matches: TemplateMatch[] = [];
    for (const candidate of candidates.sort()) {
        if (!(await pathExists(candidate))) continue;

        let fields: Fields;
        try {
            fields = engine.extract(templateName, candidate);
        } catch (e: unknown) {
            if (e instanceof NoMatchError) continue;
            throw e;
        }
        if (pinnedFields.every(([field, value]) => fields[field] === value)) {
            matches.push({ path: candidate, fields });
        }
    }
    return matches;
}

async function readDirectory(dir: string): Promise<string[]> {
    try {
        return await fs.readdir(dir);
    } catch (e: unknown) {
        if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) return [];
        throw e;
    }
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.stat(target);
        return true;
    } catch (e: unknown) {
        if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) return false;
        throw e;
    }
}
