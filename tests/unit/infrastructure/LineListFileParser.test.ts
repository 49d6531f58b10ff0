import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DatasetIOError } from '../../../src/domain/errors/DatasetErrors';
import { parseLineListFile, splitListContent } from '../../../src/infrastructure/lists/LineListFileParser';

describe('splitListContent', () => {
    it('should return one trimmed entry per line', () => {
        expect(splitListContent('a.png\n  b.png \nc.png\n')).toEqual(['a.png', 'b.png', 'c.png']);
    });

    it('should not add an entry for the final newline', () => {
        expect(splitListContent('a.png\n')).toEqual(['a.png']);
    });

    it('should keep the last line without a newline', () => {
        expect(splitListContent('a.png\nb.png')).toEqual(['a.png', 'b.png']);
    });

    it('should keep blank lines in position', () => {
        expect(splitListContent('a.png\n\nc.png\n')).toEqual(['a.png', '', 'c.png']);
    });

    it('should keep a trailing blank line', () => {
        expect(splitListContent('a.png\n\n')).toEqual(['a.png', '']);
    });

    it('should strip carriage returns', () => {
        expect(splitListContent('a.png\r\nb.png\r\n')).toEqual(['a.png', 'b.png']);
    });

    it('should return nothing for empty content', () => {
        expect(splitListContent('')).toEqual([]);
    });
});

describe('parseLineListFile', () => {
    let tmpDir: string;

    beforeAll(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'list-parser-'));
    });

    afterAll(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should read a list file from disk', () => {
        const listFile = path.join(tmpDir, 'train.txt');
        fs.writeFileSync(listFile, 'city/a.png\ncity/b.png\n', 'utf-8');

        expect(parseLineListFile(listFile)).toEqual(['city/a.png', 'city/b.png']);
    });

    it('should throw DatasetIOError for a missing file', () => {
        const missing = path.join(tmpDir, 'missing.txt');

        expect(() => parseLineListFile(missing)).toThrow(DatasetIOError);
        expect(() => parseLineListFile(missing)).toThrow(`Cannot read file ${missing} (ENOENT)`);
    });
});
