/**
 * Array representations flowing through the sample pipeline.
 * Every buffer is row-major.
 */

/** Pixels excluded from loss and metrics. */
export const IGNORE_LABEL = 255;

export const COLOR_CHANNELS = 3;

/**
 * Decoded color image, H x W x 3 RGB samples.
 */
export interface ColorImage {
    width: number;
    height: number;
    data: Uint8Array;
}

/**
 * Decoded single-channel label image holding raw dataset ids, H x W.
 * 16-bit label maps keep their full range in a Uint16Array.
 */
export interface LabelImage {
    width: number;
    height: number;
    data: Uint8Array | Uint16Array;
}

/**
 * Normalized network input: BGR channels first.
 */
export interface ImageTensor {
    /** [channels, height, width] */
    shape: [number, number, number];
    data: Float32Array;
}

/**
 * Train-id label map.
 */
export interface LabelTensor {
    /** [height, width] */
    shape: [number, number];
    data: Int32Array;
}

export interface SegmentationSample {
    image: ImageTensor;
    label: LabelTensor;
}

export type RgbColor = readonly [number, number, number];

/** Per-channel mean in BGR order. */
export type ChannelMean = readonly [number, number, number];
