/**
 * Segmentation List
 *
 * Indexes paired image/label files from list files and prepares samples for
 * semantic segmentation training in domain adaptation settings.
 *
 * Architecture: Ports & Adapters
 * - domain/: array types, errors and the pure preparation services
 * - domain/ports/: codec, transform and list parser contracts
 * - infrastructure/: codecs, list parsing, transforms and presets
 * - application/: SegmentationList and its factory
 */

// Domain
export * from './domain/entities/SampleArrays';
export * from './domain/errors/DatasetErrors';
export { LabelRemapper, IdToTrainId, toIdMap } from './domain/services/LabelRemapper';
export { ImageNormalizer } from './domain/services/ImageNormalizer';
export { ColorDecoder } from './domain/services/ColorDecoder';

// Ports
export * from './domain/ports/IImageCodec';
export * from './domain/ports/IPairedTransform';
export * from './domain/ports/IListFileParser';

// Adapters
export { PngJpegImageCodec } from './infrastructure/codecs/PngJpegImageCodec';
export { InMemoryImageCodec } from './infrastructure/codecs/InMemoryImageCodec';
export { parseLineListFile, splitListContent } from './infrastructure/lists/LineListFileParser';
export { IdentityTransform } from './infrastructure/transforms/IdentityTransform';
export { DatasetPreset, LabelSpace, PresetName, PRESET_NAMES, getPreset, listPresets } from './infrastructure/presets';

// Application Layer
export { SegmentationList, SegmentationListOptions, SampleRefs, SegmentationListSummary } from './application/SegmentationList';
export {
    createSegmentationList,
    createSegmentationListFromPreset,
    createSegmentationListFromConfig,
    PresetListOptions,
} from './application/SegmentationListFactory';

// Configuration
export { Config, loadConfig, getConfig, resetConfig, validateConfig } from './config';
