/**
 * Builds PNG files sample by sample, for label formats pngjs cannot write
 * (indexed color, 16-bit grayscale).
 */

import * as zlib from 'zlib';

const SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const CRC_TABLE = (() => {
    const table = new Uint32Array(256);
    for (let n = 0; n < 256; n++) {
        let c = n;
        for (let k = 0; k < 8; k++) {
            c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
        }
        table[n] = c >>> 0;
    }
    return table;
})();

function crc32(bytes: Buffer): number {
    let crc = 0xffffffff;
    for (const byte of bytes) {
        crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
    }
    return (crc ^ 0xffffffff) >>> 0;
}

function chunk(type: string, data: Buffer): Buffer {
    const length = Buffer.alloc(4);
    length.writeUInt32BE(data.length);
    const body = Buffer.concat([Buffer.from(type, 'ascii'), data]);
    const crc = Buffer.alloc(4);
    crc.writeUInt32BE(crc32(body));
    return Buffer.concat([length, body, crc]);
}

export interface RawPngOptions {
    width: number;
    height: number;
    /** 0 grayscale, 3 indexed */
    colorType: 0 | 3;
    depth: 8 | 16;
    /** One sample per pixel, row-major. */
    samples: number[];
    /** RGB entries for an indexed image. */
    palette?: Array<[number, number, number]>;
}

export function buildRawPng(options: RawPngOptions): Buffer {
    const { width, height, colorType, depth, samples, palette } = options;
    const bytesPerSample = depth / 8;

    const header = Buffer.alloc(13);
    header.writeUInt32BE(width, 0);
    header.writeUInt32BE(height, 4);
    header[8] = depth;
    header[9] = colorType;

    const rowLength = 1 + width * bytesPerSample;
    const raw = Buffer.alloc(height * rowLength);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const offset = y * rowLength + 1 + x * bytesPerSample;
            const value = samples[y * width + x];
            if (depth === 16) {
                raw.writeUInt16BE(value, offset);
            } else {
                raw[offset] = value;
            }
        }
    }

    const chunks = [chunk('IHDR', header)];
    if (palette) {
        chunks.push(chunk('PLTE', Buffer.from(palette.flat())));
    }
    chunks.push(chunk('IDAT', zlib.deflateSync(raw)), chunk('IEND', Buffer.alloc(0)));
    return Buffer.concat([SIGNATURE, ...chunks]);
}

/** A 256-entry palette that is black except for the given entries. */
export function paletteWith(entries: Record<number, [number, number, number]>): Array<[number, number, number]> {
    const palette: Array<[number, number, number]> = [];
    for (let i = 0; i < 256; i++) {
        palette.push(entries[i] ?? [0, 0, 0]);
    }
    return palette;
}
