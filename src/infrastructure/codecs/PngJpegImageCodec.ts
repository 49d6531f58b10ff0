import fs from 'fs';
import path from 'path';
import { decode as decodePng } from 'fast-png';
import * as jpeg from 'jpeg-js';
import { PNG } from 'pngjs';
import { COLOR_CHANNELS, ColorImage, LabelImage } from '../../domain/entities/SampleArrays';
import { DatasetIOError, ImageDecodeError } from '../../domain/errors/DatasetErrors';
import { IImageCodec } from '../../domain/ports/IImageCodec';

interface DecodedPixels {
    width: number;
    height: number;
    data: ArrayLike<number>;
    channels: number;
    depth: number;
}

const RGBA_CHANNELS = 4;

/**
 * Decodes PNG and JPEG files from the local file system.
 *
 * Color images go through pngjs / jpeg-js and keep RGB. Label PNGs go through
 * fast-png so that palette PNGs yield their palette indices and 16-bit
 * grayscale keeps its full range. A label stored as RGB must be gray
 * (equal channels); anything else is rejected rather than read as colors.
 */
export class PngJpegImageCodec implements IImageCodec {
    readColor(filePath: string): ColorImage {
        const ext = checkExtension(filePath);
        const buffer = readFile(filePath);
        const rgba = decodeOrThrow(filePath, (): DecodedPixels => {
            if (ext === '.png') {
                const png = PNG.sync.read(buffer);
                return { width: png.width, height: png.height, data: png.data, channels: RGBA_CHANNELS, depth: 8 };
            }
            return decodeJpeg(buffer);
        });

        const plane = rgba.width * rgba.height;
        const data = new Uint8Array(plane * COLOR_CHANNELS);
        for (let p = 0; p < plane; p++) {
            data[p * COLOR_CHANNELS] = rgba.data[p * RGBA_CHANNELS];
            data[p * COLOR_CHANNELS + 1] = rgba.data[p * RGBA_CHANNELS + 1];
            data[p * COLOR_CHANNELS + 2] = rgba.data[p * RGBA_CHANNELS + 2];
        }
        return { width: rgba.width, height: rgba.height, data };
    }

    readLabel(filePath: string): LabelImage {
        const ext = checkExtension(filePath);
        const buffer = readFile(filePath);
        const pixels = decodeOrThrow(filePath, (): DecodedPixels => {
            if (ext === '.png') {
                // indexed PNGs come back with one channel holding the palette index
                const png = decodePng(buffer);
                return { width: png.width, height: png.height, data: png.data, channels: png.channels, depth: png.depth };
            }
            return decodeJpeg(buffer);
        });

        return toLabelPlane(filePath, pixels);
    }
}

function checkExtension(filePath: string): string {
    const ext = path.extname(filePath).toLowerCase();
    if (ext !== '.png' && ext !== '.jpg' && ext !== '.jpeg') {
        throw new ImageDecodeError(filePath, `Unsupported image extension "${ext}": ${filePath}`);
    }
    return ext;
}

function readFile(filePath: string): Buffer {
    try {
        return fs.readFileSync(filePath);
    } catch (error) {
        throw DatasetIOError.fromFsError(filePath, error);
    }
}

function decodeOrThrow(filePath: string, decode: () => DecodedPixels): DecodedPixels {
    try {
        return decode();
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ImageDecodeError(filePath, `Failed to decode ${filePath}: ${reason}`, { cause: error });
    }
}

function decodeJpeg(buffer: Buffer): DecodedPixels {
    const decoded = jpeg.decode(buffer, { useTArray: true, formatAsRGBA: true });
    return { width: decoded.width, height: decoded.height, data: decoded.data, channels: RGBA_CHANNELS, depth: 8 };
}

function toLabelPlane(filePath: string, pixels: DecodedPixels): LabelImage {
    const { width, height, data, channels, depth } = pixels;
    if (depth !== 8 && depth !== 16) {
        throw new ImageDecodeError(filePath, `Unsupported label bit depth ${depth}: ${filePath}`);
    }

    const plane = width * height;
    const out = depth === 16 ? new Uint16Array(plane) : new Uint8Array(plane);
    const colored = channels >= COLOR_CHANNELS;
    for (let p = 0; p < plane; p++) {
        const base = p * channels;
        const value = data[base];
        if (colored && (data[base + 1] !== value || data[base + 2] !== value)) {
            throw new ImageDecodeError(
                filePath,
                `Label ${filePath} stores colors, not raw ids: pixel ${p} is (${value}, ${data[base + 1]}, ${data[base + 2]})`
            );
        }
        out[p] = value;
    }

    return { width, height, data: out };
}
