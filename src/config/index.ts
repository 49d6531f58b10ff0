import dotenv from 'dotenv';
import { DatasetConfigError } from '../domain/errors/DatasetErrors';
import { getPreset, isPresetName, PRESET_NAMES, PresetName } from '../infrastructure/presets';

// Load environment variables
dotenv.config();

/**
 * Dataset configuration loaded from environment variables.
 */
export interface Config {
    // Dataset location
    datasetRoot: string;
    preset: PresetName;
    imageListFile: string;
    labelListFile: string;
    dataFolder: string;
    labelFolder: string;

    // Preparation
    normalize: boolean; // Subtract the preset's BGR mean

    // Diagnostics
    eagerValidation: boolean; // Fail at construction on inconsistent lists
    verbose: boolean;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new DatasetConfigError(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new DatasetConfigError(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

function getEnvVarPreset(key: string, defaultValue: PresetName): PresetName {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    if (!isPresetName(value)) {
        throw new DatasetConfigError(`Environment variable ${key} must be one of ${PRESET_NAMES.join(', ')}, got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const preset = getEnvVarPreset('SEGMENTATION_PRESET', 'cityscapes');
    const { dataFolder, labelFolder } = getPreset(preset);

    return {
        // Dataset location
        datasetRoot: getEnvVar('SEGMENTATION_ROOT', './data'),
        preset,
        imageListFile: getEnvVar('SEGMENTATION_IMAGE_LIST'),
        labelListFile: getEnvVar('SEGMENTATION_LABEL_LIST'),
        dataFolder: getEnvVar('SEGMENTATION_DATA_FOLDER', dataFolder),
        labelFolder: getEnvVar('SEGMENTATION_LABEL_FOLDER', labelFolder),

        // Preparation
        normalize: getEnvVarBoolean('SEGMENTATION_NORMALIZE', true),

        // Diagnostics
        eagerValidation: getEnvVarBoolean('SEGMENTATION_EAGER_VALIDATION', false),
        verbose: getEnvVarBoolean('SEGMENTATION_VERBOSE', false),
    };
}

/**
 * Checks the configuration for values that load but cannot work together.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.datasetRoot) {
        errors.push('SEGMENTATION_ROOT must not be empty');
    }
    if (!config.imageListFile) {
        errors.push('SEGMENTATION_IMAGE_LIST must not be empty');
    }
    if (!config.labelListFile) {
        errors.push('SEGMENTATION_LABEL_LIST must not be empty');
    }
    if (config.imageListFile && config.imageListFile === config.labelListFile) {
        errors.push('SEGMENTATION_IMAGE_LIST and SEGMENTATION_LABEL_LIST point at the same file');
    }
    if (config.dataFolder && config.dataFolder === config.labelFolder) {
        errors.push('SEGMENTATION_DATA_FOLDER and SEGMENTATION_LABEL_FOLDER point at the same directory');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
