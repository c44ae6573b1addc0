export { filterTable, matchesSearch, matchesFacet } from './filter.js';
export {
    distinctValues,
    groupedUniqueCount,
    vendorsByPool,
    topNaics,
    vendorsByDomain,
    summarizeTable,
    buildAggregateViews,
} from './aggregate.js';
export type { AggregateViews } from './aggregate.js';
export { selectColumns, toDelimitedText, parseDelimitedText, stripBom } from './export.js';
