import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { parseExportedFiles, scanExportArea } from './export-scan.js';

describe('export-scan', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'texpub-export-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function write(...names: string[]): Promise<void> {
        for (const name of names) {
            await fs.mkdir(path.dirname(path.join(tempDir, name)), { recursive: true });
            await fs.writeFile(path.join(tempDir, name), '');
        }
    }

    it('lists exported files recursively, sorted, skipping dotfiles', async () => {
        await write('Body_Normal_raw.png', 'Body_BaseColor_sRGB.png', 'tiles/Body_Height_raw.1001.exr', '.DS_Store');

        const scan = await scanExportArea(tempDir);

        expect(scan.matched.map(file => file.filename)).toEqual([
            'Body_BaseColor_sRGB.png',
            'Body_Normal_raw.png',
            'Body_Height_raw.1001.exr',
        ]);
        expect(scan.matched[2]).toMatchObject({ textureSet: 'Body', mapName: 'Height', colorSpace: 'raw', udim: 1001, extension: 'exr' });
        expect(scan.mismatched).toEqual([]);
    });

    it('reports files that do not follow the naming pattern', async () => {
        await write('Body_BaseColor_sRGB.png', 'notes.txt');

        const scan = await scanExportArea(tempDir);

        expect(scan.matched).toHaveLength(1);
        expect(scan.mismatched).toHaveLength(1);
        expect(scan.mismatched[0].path).toBe(path.join(tempDir, 'notes.txt'));
    });

    it('returns an empty scan for a missing directory', async () => {
        expect(await scanExportArea(path.join(tempDir, 'missing'))).toEqual({ matched: [], mismatched: [] });
    });

    it('parses a reported file list using known texture set names', () => {
        const scan = parseExportedFiles(['/out/Hull_Main_BaseColor_sRGB.png'], { textureSets: ['Hull_Main'] });
        expect(scan.matched[0]).toMatchObject({ textureSet: 'Hull_Main', mapName: 'BaseColor', colorSpace: 'sRGB' });
    });
});
