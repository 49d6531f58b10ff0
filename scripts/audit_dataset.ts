import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { loadConfig, validateConfig } from '../src/config';
import { createSegmentationListFromConfig } from '../src/application/SegmentationListFactory';
import { IdentityTransform } from '../src/infrastructure/transforms/IdentityTransform';

// Load env from root
dotenv.config({ path: path.resolve(__dirname, '../.env') });

function missingFiles(paths: string[]): string[] {
    return paths.filter(filePath => !fs.existsSync(filePath));
}

async function audit(): Promise<number> {
    console.log('📋 Loading configuration...');
    const config = loadConfig();

    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        return 1;
    }

    const dataset = createSegmentationListFromConfig(config, new IdentityTransform());
    const summary = dataset.describe();
    console.log('------------------------------------------------');
    console.log('Preset:', config.preset);
    console.log('Root:', summary.root);
    console.log('Images:', summary.length);
    console.log('Labels:', summary.labelCount);
    console.log('Classes:', summary.numClasses);
    console.log('------------------------------------------------');

    const problems = dataset.validate();
    const missingImages = missingFiles(dataset.collectImagePaths());
    const missingLabels = missingFiles(dataset.collectLabelPaths());

    problems.forEach((problem) => console.error(`  - ${problem}`));
    missingImages.forEach((filePath) => console.error(`  - Missing image: ${filePath}`));
    missingLabels.forEach((filePath) => console.error(`  - Missing label: ${filePath}`));

    const total = problems.length + missingImages.length + missingLabels.length;
    if (total > 0) {
        console.error(`❌ Audit found ${total} problem(s)`);
        return 1;
    }

    console.log('✅ Dataset is consistent');
    return 0;
}

audit()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error('❌ Audit failed:', error);
        process.exitCode = 1;
    });
