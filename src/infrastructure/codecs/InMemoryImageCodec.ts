/**
 * In-Memory Image Codec
 *
 * Serves pre-registered images by path. Useful for tests and for datasets
 * that are synthesized in process.
 */

import path from 'path';
import { ColorImage, LabelImage } from '../../domain/entities/SampleArrays';
import { DatasetIOError } from '../../domain/errors/DatasetErrors';
import { IImageCodec } from '../../domain/ports/IImageCodec';

export class InMemoryImageCodec implements IImageCodec {
    private colors: Map<string, ColorImage> = new Map();
    private labels: Map<string, LabelImage> = new Map();

    addColor(filePath: string, image: ColorImage): this {
        this.colors.set(path.normalize(filePath), image);
        return this;
    }

    addLabel(filePath: string, label: LabelImage): this {
        this.labels.set(path.normalize(filePath), label);
        return this;
    }

    readColor(filePath: string): ColorImage {
        const image = this.colors.get(path.normalize(filePath));
        if (!image) {
            throw new DatasetIOError(filePath, `No image registered at ${filePath}`);
        }
        return { width: image.width, height: image.height, data: image.data.slice() };
    }

    readLabel(filePath: string): LabelImage {
        const label = this.labels.get(path.normalize(filePath));
        if (!label) {
            throw new DatasetIOError(filePath, `No label registered at ${filePath}`);
        }
        return { width: label.width, height: label.height, data: label.data.slice() };
    }

    /**
     * Number of registered files (images and labels).
     */
    size(): number {
        return this.colors.size + this.labels.size;
    }
}
