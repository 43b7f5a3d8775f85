/**
 * Preprocessor Plugin Registry
 *
 * Central registry of vendor normalizers, selected by
 * AppConfig.preprocessTarget.
 */

import type { PreprocessorPlugin } from './types';

import { plugin as microsoft365 } from './microsoft365';
import { plugin as statuspage } from './statuspage';

// All registered plugins
export const plugins: PreprocessorPlugin[] = [
    microsoft365,
    statuspage,
];

// Map for O(1) lookup by ID
export const pluginMap = new Map<string, PreprocessorPlugin>(
    plugins.map(p => [p.id, p])
);

// Get plugin by ID
export const getPlugin = (id: string): PreprocessorPlugin | undefined => {
    return pluginMap.get(id);
};
