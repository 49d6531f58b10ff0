import { ColorImage, LabelImage } from '../entities/SampleArrays';

/**
 * IImageCodec - Port for decoding image and label files.
 * Implementations: PngJpegImageCodec, InMemoryImageCodec
 */
export interface IImageCodec {
    /**
     * Decodes a file as a 3-channel RGB image.
     * @throws DatasetIOError when the file is missing or unreadable
     * @throws ImageDecodeError when the content is corrupt or unsupported
     */
    readColor(path: string): ColorImage;

    /**
     * Decodes a file as a single-channel map of raw label ids.
     * @throws DatasetIOError when the file is missing or unreadable
     * @throws ImageDecodeError when the content is corrupt or unsupported
     */
    readLabel(path: string): LabelImage;
}
