/**
 * Built-in dataset presets.
 *
 * GTA5 labels use the Cityscapes id space, so both presets share one label
 * space and differ only in their directory layout.
 */

import { ChannelMean, RgbColor } from '../../domain/entities/SampleArrays';
import { DatasetConfigError } from '../../domain/errors/DatasetErrors';
import cityscapesLabelSpace from './cityscapes-label-space.json';

export type PresetName = 'cityscapes' | 'gta5';

export const PRESET_NAMES: readonly PresetName[] = ['cityscapes', 'gta5'];

export interface LabelSpace {
    classes: readonly string[];
    idToTrainId: ReadonlyMap<number, number>;
    /** One color per train id, plus a final color for unknown pixels. */
    trainIdToColor: readonly RgbColor[];
    /** BGR mean of the source images. */
    mean: ChannelMean;
}

export interface DatasetPreset extends LabelSpace {
    name: PresetName;
    dataFolder: string;
    labelFolder: string;
}

export interface LabelSpaceJson {
    classes: string[];
    idToTrainId: Record<string, number>;
    trainIdToColor: number[][];
    mean: number[];
}

function toTriple(values: number[], what: string): [number, number, number] {
    if (values.length !== 3) {
        throw new DatasetConfigError(`${what} must have 3 values, got ${values.length}`);
    }
    return [values[0], values[1], values[2]];
}

export function parseLabelSpace(name: string, json: LabelSpaceJson): LabelSpace {
    const idToTrainId = new Map<number, number>();
    for (const [rawId, trainId] of Object.entries(json.idToTrainId)) {
        const id = Number(rawId);
        if (!Number.isInteger(id)) {
            throw new DatasetConfigError(`Label space "${name}" has a non-integer raw id: "${rawId}"`);
        }
        idToTrainId.set(id, trainId);
    }

    return {
        classes: [...json.classes],
        idToTrainId,
        trainIdToColor: json.trainIdToColor.map((color, i) => toTriple(color, `Label space "${name}" color ${i}`)),
        mean: toTriple(json.mean, `Label space "${name}" mean`),
    };
}

const cityscapes = parseLabelSpace('cityscapes', cityscapesLabelSpace);

const PRESETS: Record<PresetName, DatasetPreset> = {
    cityscapes: {
        ...cityscapes,
        name: 'cityscapes',
        dataFolder: 'leftImg8bit',
        labelFolder: 'gtFine',
    },
    gta5: {
        ...cityscapes,
        name: 'gta5',
        dataFolder: 'images',
        labelFolder: 'labels',
    },
};

export function isPresetName(value: string): value is PresetName {
    return PRESET_NAMES.some(name => name === value);
}

export function getPreset(name: string): DatasetPreset {
    if (!isPresetName(name)) {
        throw new DatasetConfigError(`Unknown dataset preset "${name}". Available: ${PRESET_NAMES.join(', ')}`);
    }
    return PRESETS[name];
}

export function listPresets(): DatasetPreset[] {
    return PRESET_NAMES.map(name => PRESETS[name]);
}
