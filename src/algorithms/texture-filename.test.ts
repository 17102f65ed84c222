import { describe, it, expect } from 'vitest';
import { parseTextureFilename, isTextureFilename } from './texture-filename.js';
import { PatternMismatchError } from '../pipeline-errors.js';

describe('parseTextureFilename', () => {
    it('parses an untiled map', () => {
        expect(parseTextureFilename('/tmp/export/hull_BaseColor_sRGB.png')).toEqual({
            path: '/tmp/export/hull_BaseColor_sRGB.png',
            filename: 'hull_BaseColor_sRGB.png',
            textureSet: 'hull',
            mapName: 'BaseColor',
            colorSpace: 'sRGB',
            extension: 'png',
        });
    });

    it('parses a UDIM tile', () => {
        const file = parseTextureFilename('hull_Normal_raw.1002.exr');
        expect(file.udim).toBe(1002);
        expect(file.mapName).toBe('Normal');
        expect(file.extension).toBe('exr');
    });

    it('uses known texture set names, longest first', () => {
        const textureSets = ['hull', 'hull_trim'];
        expect(parseTextureFilename('hull_trim_Normal_raw.png', { textureSets }).textureSet).toBe('hull_trim');
        expect(parseTextureFilename('hull_Normal_raw.png', { textureSets }).textureSet).toBe('hull');
    });

    it('falls back to the default pattern for unknown sets', () => {
        expect(parseTextureFilename('deck_Metal_raw.png', { textureSets: ['hull'] }).textureSet).toBe('deck');
    });

    it('rejects a map name with an underscore', () => {
        expect(() => parseTextureFilename('my_hull_Normal_raw.png')).toThrow(
            "File 'my_hull_Normal_raw.png' does not match '<textureSet>_<mapName>_<colorSpace>[.<udim>].<ext>': " +
            "map name must not contain '_'.",
        );
    });

    it.each([
        ['hull_Normal raw.png', 'whitespace is not allowed'],
        ['hull_BaseColor_sRGB', 'missing file extension'],
        ['hull_BaseColor_sRGB.p-g', 'invalid file extension'],
        ['hull_Normal_raw.101.png', 'UDIM tile must have 4 digits'],
        ['hull_BaseColor_sRGB.final.png', "unexpected '.' in name"],
        ['hull_BaseColor.png', 'expected <textureSet>_<mapName>_<colorSpace> with non-empty segments'],
        ['hull__sRGB.png', 'expected <textureSet>_<mapName>_<colorSpace> with non-empty segments'],
    ])('explains why %s is rejected', (filename, reason) => {
        try {
            parseTextureFilename(filename);
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(PatternMismatchError);
            if (e instanceof PatternMismatchError) {
                expect(e.reason).toBe(reason);
                expect(e.filenames).toEqual([filename]);
            }
        }
    });
});

describe('isTextureFilename', () => {
    it('reports conformance without throwing', () => {
        expect(isTextureFilename('hull_BaseColor_sRGB.png')).toBe(true);
        expect(isTextureFilename('notes.txt')).toBe(false);
    });
});
