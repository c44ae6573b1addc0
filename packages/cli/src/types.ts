/**
 * Award Explorer CLI - Core Types
 */

import type { FilterCriteria } from '@award-explorer/shared';

export interface ExploreOptions {
    criteria: FilterCriteria;
    csv?: string;
    xlsx?: string;
    rows?: number;
    config?: string;
    interactive: boolean;
    columns: boolean;
}
