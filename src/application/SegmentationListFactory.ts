/**
 * Segmentation List Factory
 *
 * Builds fully-wired SegmentationList instances from explicit options, from a
 * built-in preset, or from the environment configuration.
 */

import { Config } from '../config';
import { IImageCodec } from '../domain/ports/IImageCodec';
import { IPairedTransform, PairedTransformFn } from '../domain/ports/IPairedTransform';
import { getPreset, PresetName } from '../infrastructure/presets';
import { SegmentationList, SegmentationListOptions } from './SegmentationList';

export function createSegmentationList(options: SegmentationListOptions): SegmentationList {
    return new SegmentationList(options);
}

export interface PresetListOptions {
    preset: PresetName;
    root: string;
    imageListFile: string;
    labelListFile: string;
    transform: IPairedTransform | PairedTransformFn;
    /** Subtract the preset mean (default: true) */
    normalize?: boolean;
    /** Overrides the preset's image folder */
    dataFolder?: string;
    /** Overrides the preset's label folder */
    labelFolder?: string;
    codec?: IImageCodec;
    eagerValidation?: boolean;
}

/**
 * Creates a list over a dataset with a built-in label space.
 *
 * @example
 * ```typescript
 * const gta5 = createSegmentationListFromPreset({
 *     preset: 'gta5',
 *     root: 'data/GTA5',
 *     imageListFile: 'data/GTA5/image_list/train.txt',
 *     labelListFile: 'data/GTA5/image_list/train_label.txt',
 *     transform: new IdentityTransform(),
 * });
 * ```
 */
export function createSegmentationListFromPreset(options: PresetListOptions): SegmentationList {
    const preset = getPreset(options.preset);

    return new SegmentationList({
        root: options.root,
        classes: preset.classes,
        imageListFile: options.imageListFile,
        labelListFile: options.labelListFile,
        dataFolder: options.dataFolder ?? preset.dataFolder,
        labelFolder: options.labelFolder ?? preset.labelFolder,
        mean: options.normalize === false ? undefined : preset.mean,
        idToTrainId: preset.idToTrainId,
        trainIdToColor: preset.trainIdToColor,
        transform: options.transform,
        codec: options.codec,
        eagerValidation: options.eagerValidation,
    });
}

/**
 * Creates a list from environment configuration (see loadConfig).
 */
export function createSegmentationListFromConfig(
    config: Config,
    transform: IPairedTransform | PairedTransformFn,
    codec?: IImageCodec
): SegmentationList {
    const list = createSegmentationListFromPreset({
        preset: config.preset,
        root: config.datasetRoot,
        imageListFile: config.imageListFile,
        labelListFile: config.labelListFile,
        dataFolder: config.dataFolder,
        labelFolder: config.labelFolder,
        normalize: config.normalize,
        eagerValidation: config.eagerValidation,
        transform,
        codec,
    });

    if (config.verbose) {
        const summary = list.describe();
        console.log(
            `[SegmentationList] ${config.preset}: ${summary.length} samples, ${summary.numClasses} classes under ${summary.root}`
        );
        for (const problem of list.validate()) {
            console.warn(`[SegmentationList] ${problem}`);
        }
    }

    return list;
}
