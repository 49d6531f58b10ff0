import { ChannelMean, COLOR_CHANNELS, ColorImage, ImageTensor } from '../entities/SampleArrays';
import { DatasetConfigError } from '../errors/DatasetErrors';

/**
 * Converts decoded RGB images into network input and back.
 *
 * Forward: RGB -> BGR, subtract the BGR mean when one is set, HWC -> CHW.
 * Inverse: CHW -> HWC, add the mean back, BGR -> RGB, round to 8-bit.
 */
export class ImageNormalizer {
    constructor(private readonly mean?: ChannelMean) { }

    toTensor(image: ColorImage): ImageTensor {
        const { width, height, data } = image;
        const plane = width * height;
        if (data.length !== COLOR_CHANNELS * plane) {
            throw new DatasetConfigError(
                `Expected ${COLOR_CHANNELS * plane} RGB values for a ${width}x${height} image, got ${data.length}`
            );
        }
        const out = new Float32Array(COLOR_CHANNELS * plane);

        for (let p = 0; p < plane; p++) {
            const base = p * COLOR_CHANNELS;
            for (let c = 0; c < COLOR_CHANNELS; c++) {
                // output channel c is BGR, so read RGB channel 2 - c
                const value = data[base + (COLOR_CHANNELS - 1 - c)];
                out[c * plane + p] = this.mean ? value - this.mean[c] : value;
            }
        }

        return { shape: [COLOR_CHANNELS, height, width], data: out };
    }

    toImage(tensor: ImageTensor): ColorImage {
        if (!this.mean) {
            throw new DatasetConfigError('Cannot decode input: no mean is configured');
        }
        const [channels, height, width] = tensor.shape;
        const plane = width * height;
        if (channels !== COLOR_CHANNELS || tensor.data.length !== COLOR_CHANNELS * plane) {
            throw new DatasetConfigError(
                `Expected an image tensor of shape [3, H, W], got [${tensor.shape.join(', ')}] with ${tensor.data.length} values`
            );
        }

        const out = new Uint8Array(plane * COLOR_CHANNELS);
        for (let p = 0; p < plane; p++) {
            const base = p * COLOR_CHANNELS;
            for (let k = 0; k < COLOR_CHANNELS; k++) {
                const c = COLOR_CHANNELS - 1 - k;
                out[base + k] = toByte(tensor.data[c * plane + p] + this.mean[c]);
            }
        }

        return { width, height, data: out };
    }
}

function toByte(value: number): number {
    return Math.min(255, Math.max(0, Math.round(value)));
}
