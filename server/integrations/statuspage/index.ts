/**
 * Atlassian Statuspage Plugin
 *
 * Normalizes the component list of any Statuspage-hosted status page.
 */

import type { PreprocessorPlugin } from '../types';
import { id, name, description, provider, dataset, defaultNamespace } from './config';
import { StatuspageNormalizer } from './normalizer';

export const plugin: PreprocessorPlugin = {
    id,
    name,
    description,
    provider,
    dataset,
    defaultNamespace,
    normalizer: new StatuspageNormalizer(),
};
