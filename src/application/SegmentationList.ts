import path from 'path';
import {
    ChannelMean,
    ColorImage,
    IGNORE_LABEL,
    ImageTensor,
    LabelTensor,
    RgbColor,
    SegmentationSample,
} from '../domain/entities/SampleArrays';
import { DatasetConfigError, IndexOutOfRangeError } from '../domain/errors/DatasetErrors';
import { IImageCodec } from '../domain/ports/IImageCodec';
import { ListFileParser } from '../domain/ports/IListFileParser';
import { IPairedTransform, PairedTransformFn, toPairedTransform } from '../domain/ports/IPairedTransform';
import { ColorDecoder } from '../domain/services/ColorDecoder';
import { ImageNormalizer } from '../domain/services/ImageNormalizer';
import { IdToTrainId, LabelRemapper, toIdMap } from '../domain/services/LabelRemapper';
import { PngJpegImageCodec } from '../infrastructure/codecs/PngJpegImageCodec';
import { parseLineListFile } from '../infrastructure/lists/LineListFileParser';

export interface SegmentationListOptions {
    /** Root directory of the dataset */
    root: string;
    /** Class names, indexed by train id */
    classes: readonly string[];
    /** List file with one relative image path per line */
    imageListFile: string;
    /** List file with one relative label path per line, aligned with the image list */
    labelListFile: string;
    /** Sub-directory of `root` holding the images */
    dataFolder: string;
    /** Sub-directory of `root` holding the labels */
    labelFolder: string;
    /** BGR mean subtracted from every image. No normalization when omitted. */
    mean?: ChannelMean;
    /** Raw label id to train id. When omitted every label pixel is ignore. */
    idToTrainId?: IdToTrainId;
    /** Color per train id, followed by the color for unknown pixels. Only used by decodeTarget. */
    trainIdToColor?: readonly RgbColor[];
    /** Joint image/label augmentation, e.g. IdentityTransform */
    transform: IPairedTransform | PairedTransformFn;
    /** Defaults to PngJpegImageCodec */
    codec?: IImageCodec;
    /** Defaults to one entry per line */
    parseImageList?: ListFileParser;
    /** Defaults to one entry per line */
    parseLabelList?: ListFileParser;
    /** Run validate() at construction and throw on any problem */
    eagerValidation?: boolean;
}

export interface SampleRefs {
    imageRef: string;
    labelRef: string;
    imagePath: string;
    labelPath: string;
}

export interface SegmentationListSummary {
    root: string;
    dataFolder: string;
    labelFolder: string;
    numClasses: number;
    length: number;
    labelCount: number;
    normalized: boolean;
    remapped: boolean;
}

/**
 * A generic dataset of paired images and segmentation labels for domain
 * adaptation.
 *
 * Samples are listed by two aligned list files, e.g.
 * ```
 * source_dir/dog_xxx.png
 * target_dir/dog_xxy.png
 * ```
 * and resolved as `root/dataFolder/<imageRef>` and `root/labelFolder/<labelRef>`.
 * Nothing is read besides the list files until a sample is fetched.
 *
 * @example
 * ```typescript
 * const dataset = new SegmentationList({
 *     root: 'data/cityscapes',
 *     classes: ['road', 'car'],
 *     imageListFile: 'data/cityscapes/image_list/train.txt',
 *     labelListFile: 'data/cityscapes/image_list/train_label.txt',
 *     dataFolder: 'leftImg8bit',
 *     labelFolder: 'gtFine',
 *     idToTrainId: { 7: 0, 26: 1 },
 *     transform: new IdentityTransform(),
 * });
 * const { image, label } = dataset.fetch(0);
 * ```
 */
export class SegmentationList {
    readonly ignoreLabel = IGNORE_LABEL;
    readonly root: string;
    readonly classes: readonly string[];
    readonly dataFolder: string;
    readonly labelFolder: string;
    readonly mean?: ChannelMean;
    readonly idToTrainId?: ReadonlyMap<number, number>;
    readonly trainIdToColor: readonly RgbColor[];
    readonly imageRefs: readonly string[];
    readonly labelRefs: readonly string[];

    private readonly transform: IPairedTransform;
    private readonly codec: IImageCodec;
    private readonly remapper: LabelRemapper;
    private readonly normalizer: ImageNormalizer;
    private readonly colorDecoder: ColorDecoder;

    constructor(options: SegmentationListOptions) {
        this.root = options.root;
        this.classes = Object.freeze([...options.classes]);
        this.dataFolder = options.dataFolder;
        this.labelFolder = options.labelFolder;
        this.mean = options.mean ? [options.mean[0], options.mean[1], options.mean[2]] : undefined;
        this.idToTrainId = toIdMap(options.idToTrainId);
        this.trainIdToColor = Object.freeze((options.trainIdToColor ?? []).map((c): RgbColor => [c[0], c[1], c[2]]));

        const parseImageList = options.parseImageList ?? parseLineListFile;
        const parseLabelList = options.parseLabelList ?? parseLineListFile;
        this.imageRefs = Object.freeze(parseImageList(options.imageListFile));
        this.labelRefs = Object.freeze(parseLabelList(options.labelListFile));

        this.transform = toPairedTransform(options.transform);
        this.codec = options.codec ?? new PngJpegImageCodec();
        this.remapper = new LabelRemapper(this.idToTrainId, this.ignoreLabel);
        this.normalizer = new ImageNormalizer(this.mean);
        this.colorDecoder = new ColorDecoder(this.trainIdToColor, this.numClasses, this.ignoreLabel);

        if (options.eagerValidation) {
            const problems = this.validate();
            if (problems.length > 0) {
                throw new DatasetConfigError(`Invalid segmentation list:\n - ${problems.join('\n - ')}`);
            }
        }
    }

    /** Number of samples, taken from the image list. */
    get length(): number {
        return this.imageRefs.length;
    }

    get numClasses(): number {
        return this.classes.length;
    }

    /**
     * Loads, transforms and normalizes one sample.
     * @returns image of shape [3, H, W] (BGR, mean subtracted) and label of shape [H, W] in train ids
     */
    fetch(index: number): SegmentationSample {
        const refs = this.getSampleRefs(index);

        const rawImage = this.codec.readColor(refs.imagePath);
        const rawLabel = this.codec.readLabel(refs.labelPath);
        const [image, label] = this.transform.apply(rawImage, rawLabel);

        return {
            image: this.normalizer.toTensor(image),
            label: this.remapper.remap(label),
        };
    }

    /**
     * Resolves the file references of one sample without reading anything.
     */
    getSampleRefs(index: number): SampleRefs {
        if (!Number.isInteger(index) || index < 0 || index >= this.length) {
            throw new IndexOutOfRangeError(index, this.length);
        }
        const imageRef = this.imageRefs[index];
        const labelRef = this.labelRefs[index];
        if (labelRef === undefined) {
            throw new IndexOutOfRangeError(
                index,
                this.labelRefs.length,
                `Label list has no entry at position ${index} (${this.labelRefs.length} entries)`
            );
        }
        return {
            imageRef,
            labelRef,
            imagePath: path.join(this.root, this.dataFolder, imageRef),
            labelPath: path.join(this.root, this.labelFolder, labelRef),
        };
    }

    /**
     * Recovers a displayable RGB image (H x W x 3) from a normalized [3, H, W] tensor.
     * @throws DatasetConfigError when no mean is configured
     */
    decodeInput(image: ImageTensor): ColorImage {
        return this.normalizer.toImage(image);
    }

    /**
     * Paints a train-id label map (H x W) with the class colors. Ignore
     * pixels take the color at index `numClasses`.
     * @throws IndexOutOfRangeError when a value has no color
     */
    decodeTarget(target: LabelTensor): ColorImage {
        return this.colorDecoder.decode(target);
    }

    /** Full paths of all images, in list order. */
    collectImagePaths(): string[] {
        return this.imageRefs.map(ref => path.join(this.root, this.dataFolder, ref));
    }

    /** Full paths of all labels, in list order. */
    collectLabelPaths(): string[] {
        return this.labelRefs.map(ref => path.join(this.root, this.labelFolder, ref));
    }

    /**
     * Checks the list for problems that would otherwise only surface at fetch
     * or decode time. Reads nothing from disk.
     */
    validate(): string[] {
        const problems: string[] = [];

        if (this.imageRefs.length !== this.labelRefs.length) {
            problems.push(`Image list has ${this.imageRefs.length} entries but label list has ${this.labelRefs.length}`);
        }

        const blankImages = blankLines(this.imageRefs);
        if (blankImages.length > 0) {
            problems.push(`Image list has blank entries at lines ${blankImages.join(', ')}`);
        }
        const blankLabels = blankLines(this.labelRefs);
        if (blankLabels.length > 0) {
            problems.push(`Label list has blank entries at lines ${blankLabels.join(', ')}`);
        }

        if (this.trainIdToColor.length > 0 && this.trainIdToColor.length < this.numClasses + 1) {
            problems.push(
                `Color table has ${this.trainIdToColor.length} entries; decoding ${this.numClasses} classes needs ${this.numClasses + 1}`
            );
        }

        if (this.idToTrainId) {
            for (const [rawId, trainId] of this.idToTrainId) {
                if (trainId !== this.ignoreLabel && (trainId < 0 || trainId >= this.numClasses)) {
                    problems.push(`Raw id ${rawId} maps to train id ${trainId}, outside [0, ${this.numClasses})`);
                }
            }
        }

        return problems;
    }

    describe(): SegmentationListSummary {
        return {
            root: this.root,
            dataFolder: this.dataFolder,
            labelFolder: this.labelFolder,
            numClasses: this.numClasses,
            length: this.length,
            labelCount: this.labelRefs.length,
            normalized: this.mean !== undefined,
            remapped: this.idToTrainId !== undefined && this.idToTrainId.size > 0,
        };
    }
}

function blankLines(refs: readonly string[]): number[] {
    const lines: number[] = [];
    refs.forEach((ref, i) => {
        if (ref === '') {
            lines.push(i + 1);
        }
    });
    return lines;
}
