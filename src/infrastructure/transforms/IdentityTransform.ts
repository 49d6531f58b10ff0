import { ColorImage, LabelImage } from '../../domain/entities/SampleArrays';
import { IPairedTransform } from '../../domain/ports/IPairedTransform';

/**
 * Passes the pair through untouched.
 */
export class IdentityTransform implements IPairedTransform {
    apply(image: ColorImage, label: LabelImage): [ColorImage, LabelImage] {
        return [image, label];
    }
}
