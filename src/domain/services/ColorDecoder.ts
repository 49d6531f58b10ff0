import { COLOR_CHANNELS, ColorImage, IGNORE_LABEL, LabelTensor, RgbColor } from '../entities/SampleArrays';
import { DatasetConfigError, IndexOutOfRangeError } from '../errors/DatasetErrors';

/**
 * Paints a train-id label map with its class colors.
 * Ignore pixels are drawn with the color at `unknownIndex`.
 */
export class ColorDecoder {
    constructor(
        private readonly palette: readonly RgbColor[],
        private readonly unknownIndex: number,
        private readonly ignoreLabel: number = IGNORE_LABEL
    ) { }

    decode(target: LabelTensor): ColorImage {
        const [height, width] = target.shape;
        const plane = width * height;
        if (target.data.length !== plane) {
            throw new DatasetConfigError(
                `Expected a label map of shape [H, W], got [${target.shape.join(', ')}] with ${target.data.length} values`
            );
        }

        const out = new Uint8Array(plane * COLOR_CHANNELS);
        for (let p = 0; p < plane; p++) {
            const value = target.data[p];
            const index = value === this.ignoreLabel ? this.unknownIndex : value;
            const color = this.palette[index];
            if (color === undefined) {
                throw new IndexOutOfRangeError(
                    index,
                    this.palette.length,
                    `Train id ${index} has no color (color table has ${this.palette.length} entries)`
                );
            }
            const base = p * COLOR_CHANNELS;
            out[base] = color[0];
            out[base + 1] = color[1];
            out[base + 2] = color[2];
        }

        return { width, height, data: out };
    }
}
