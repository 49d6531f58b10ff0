import { ColorImage, LabelImage } from '../entities/SampleArrays';

export type PairedTransformFn = (image: ColorImage, label: LabelImage) => [ColorImage, LabelImage];

/**
 * IPairedTransform - Port for augmentations applied jointly to an image and
 * its label, e.g. random crop or flip. Outputs must stay pixel-aligned.
 * Implementations: IdentityTransform
 */
export interface IPairedTransform {
    apply(image: ColorImage, label: LabelImage): [ColorImage, LabelImage];
}

export function toPairedTransform(transform: IPairedTransform | PairedTransformFn): IPairedTransform {
    return typeof transform === 'function' ? { apply: transform } : transform;
}
