import fs from 'fs';
import { DatasetIOError } from '../../domain/errors/DatasetErrors';
import { ListFileParser } from '../../domain/ports/IListFileParser';

/**
 * Splits list file content into one entry per line, trimmed.
 *
 * Blank lines are kept as empty entries so that positions stay aligned with
 * the file. A trailing newline does not add an entry.
 */
export function splitListContent(content: string): string[] {
    if (content.length === 0) {
        return [];
    }
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines.map(line => line.trim());
}

/**
 * Default list parser: a UTF-8 text file with one relative path per line.
 */
export const parseLineListFile: ListFileParser = (filePath: string): string[] => {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw DatasetIOError.fromFsError(filePath, error);
    }
    return splitListContent(content);
};
