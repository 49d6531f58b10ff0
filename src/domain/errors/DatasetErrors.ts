export type DatasetErrorCode = 'CONFIG_ERROR' | 'IO_ERROR' | 'DECODE_ERROR' | 'INDEX_ERROR';

/**
 * Base error for everything raised while indexing or preparing samples.
 */
export class DatasetError extends Error {
    constructor(
        public readonly code: DatasetErrorCode,
        message: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'DatasetError';
    }
}

/**
 * Malformed or inconsistent configuration.
 */
export class DatasetConfigError extends DatasetError {
    constructor(message: string) {
        super('CONFIG_ERROR', message);
        this.name = 'DatasetConfigError';
    }
}

/**
 * A list, image or label file could not be read.
 */
export class DatasetIOError extends DatasetError {
    constructor(
        public readonly path: string,
        message: string = `Cannot read file: ${path}`,
        options?: ErrorOptions
    ) {
        super('IO_ERROR', message, options);
        this.name = 'DatasetIOError';
    }

    static fromFsError(path: string, error: unknown): DatasetIOError {
        const reason = isErrnoException(error) && error.code
            ? error.code
            : error instanceof Error ? error.message : String(error);
        return new DatasetIOError(path, `Cannot read file ${path} (${reason})`, { cause: error });
    }
}

/**
 * File content is corrupt or in an unsupported format.
 */
export class ImageDecodeError extends DatasetError {
    constructor(
        public readonly path: string,
        message: string,
        options?: ErrorOptions
    ) {
        super('DECODE_ERROR', message, options);
        this.name = 'ImageDecodeError';
    }
}

/**
 * Sample index, or label / color table index, outside its valid range.
 */
export class IndexOutOfRangeError extends DatasetError {
    constructor(
        public readonly index: number,
        public readonly size: number,
        message: string = `Index ${index} out of range [0, ${size})`
    ) {
        super('INDEX_ERROR', message);
        this.name = 'IndexOutOfRangeError';
    }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
