import { IGNORE_LABEL, LabelImage, LabelTensor } from '../entities/SampleArrays';
import { DatasetConfigError } from '../errors/DatasetErrors';

/** Raw dataset id to train id, as a Map or a plain record. */
export type IdToTrainId = ReadonlyMap<number, number> | Readonly<Record<number, number>>;

export function toIdMap(mapping?: IdToTrainId): ReadonlyMap<number, number> | undefined {
    if (mapping === undefined) {
        return undefined;
    }
    if (isReadonlyMap(mapping)) {
        return new Map(mapping);
    }
    const entries = Object.entries(mapping).map(([key, value]): [number, number] => [Number(key), value]);
    return new Map(entries);
}

function isReadonlyMap(mapping: IdToTrainId): mapping is ReadonlyMap<number, number> {
    return mapping instanceof Map;
}

/**
 * Rewrites raw label ids into the train id space.
 * Pixels whose raw id has no entry keep the ignore label; without a mapping
 * the whole output is ignore.
 */
export class LabelRemapper {
    constructor(
        private readonly idToTrainId?: ReadonlyMap<number, number>,
        private readonly ignoreLabel: number = IGNORE_LABEL
    ) { }

    remap(label: LabelImage): LabelTensor {
        const { width, height, data } = label;
        if (data.length !== width * height) {
            throw new DatasetConfigError(
                `Expected ${width * height} label values for a ${width}x${height} label, got ${data.length}`
            );
        }
        const out = new Int32Array(width * height).fill(this.ignoreLabel);

        if (this.idToTrainId && this.idToTrainId.size > 0) {
            for (let i = 0; i < out.length; i++) {
                const trainId = this.idToTrainId.get(data[i]);
                if (trainId !== undefined) {
                    out[i] = trainId;
                }
            }
        }

        return { shape: [height, width], data: out };
    }
}
