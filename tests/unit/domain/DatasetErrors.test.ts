import {
    DatasetConfigError,
    DatasetError,
    DatasetIOError,
    ImageDecodeError,
    IndexOutOfRangeError,
    isErrnoException,
} from '../../../src/domain/errors/DatasetErrors';

describe('DatasetErrors', () => {
    it('should carry a code and a name', () => {
        const error = new DatasetConfigError('bad');

        expect(error).toBeInstanceOf(DatasetError);
        expect(error).toBeInstanceOf(Error);
        expect(error.code).toBe('CONFIG_ERROR');
        expect(error.name).toBe('DatasetConfigError');
        expect(error.message).toBe('bad');
    });

    it('should describe an index out of range', () => {
        const error = new IndexOutOfRangeError(3, 2);

        expect(error.code).toBe('INDEX_ERROR');
        expect(error.index).toBe(3);
        expect(error.size).toBe(2);
        expect(error.message).toBe('Index 3 out of range [0, 2)');
    });

    it('should keep the path of decode errors', () => {
        const error = new ImageDecodeError('/tmp/a.png', 'broken');

        expect(error.code).toBe('DECODE_ERROR');
        expect(error.path).toBe('/tmp/a.png');
    });

    describe('DatasetIOError.fromFsError', () => {
        it('should use the errno code when present', () => {
            const cause = Object.assign(new Error('no such file'), { code: 'ENOENT' });

            const error = DatasetIOError.fromFsError('/tmp/list.txt', cause);

            expect(error.code).toBe('IO_ERROR');
            expect(error.path).toBe('/tmp/list.txt');
            expect(error.message).toBe('Cannot read file /tmp/list.txt (ENOENT)');
            expect(error.cause).toBe(cause);
        });

        it('should fall back to the error message', () => {
            const error = DatasetIOError.fromFsError('/tmp/list.txt', new Error('boom'));

            expect(error.message).toBe('Cannot read file /tmp/list.txt (boom)');
        });
    });

    it('should recognise errno exceptions', () => {
        expect(isErrnoException(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe(true);
        expect(isErrnoException(new Error('x'))).toBe(false);
        expect(isErrnoException('ENOENT')).toBe(false);
    });
});
