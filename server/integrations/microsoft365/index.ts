/**
 * Microsoft 365 Service Health Plugin
 *
 * Normalizes Microsoft Graph service announcement payloads.
 */

import type { PreprocessorPlugin } from '../types';
import { id, name, description, provider, dataset, defaultNamespace } from './config';
import { Microsoft365Normalizer } from './normalizer';

export const plugin: PreprocessorPlugin = {
    id,
    name,
    description,
    provider,
    dataset,
    defaultNamespace,
    normalizer: new Microsoft365Normalizer(),
};
