/**
 * Constants for Award Explorer.
 * The workbook layout is fixed: one contract-information sheet plus
 * one sheet per set-aside pool.
 */

/**
 * Sheet holding one row per contract.
 */
export const CONTRACT_SHEET_NAME = 'OASIS+Contract Information';

/**
 * Zero-based row of the contract sheet that carries the header.
 * Row 0 is a decorative title.
 */
export const CONTRACT_HEADER_ROW = 1;

/**
 * Zero-based header row of every pool sheet.
 */
export const POOL_HEADER_ROW = 0;

/**
 * Recognized pool sheets, compared against the trimmed sheet name.
 */
export const POOL_NAMES = [
    '8a',
    'Small Business',
    'Woman Owned SB',
    'Service Disabled Veteran Owned',
    'HUBZone',
    'Unrestricted',
] as const;

export type PoolName = (typeof POOL_NAMES)[number];

/**
 * Source column names.
 */
export const COLUMNS = {
    CONTRACT_NUMBER: 'Contract Number',
    CONTRACT_REF: 'Contract #',
    POOL: 'Pool',
    DOMAIN: 'Domain',
    NAICS: 'NAICS',
    SIN: 'SIN',
    UEI: 'UEI',
    VENDOR: 'Vendor',
    VENDOR_NAME: 'Vendor Name',
    VENDOR_CITY: 'Vendor City',
    ZIP_CODE: 'ZIP Code',
    VENDOR_DISPLAY: 'Vendor Display',
} as const;

/**
 * Suffix applied to contract-side columns whose name is already taken
 * by the pool side.
 */
export const CONTRACT_SUFFIX = '_contract';

/**
 * Vendor name candidates, highest priority first.
 */
export const VENDOR_NAME_COLUMNS = [COLUMNS.VENDOR, COLUMNS.VENDOR_NAME] as const;

/**
 * Pool-side code columns normalized like the join key.
 */
export const CODE_COLUMNS = [COLUMNS.NAICS, COLUMNS.SIN] as const;

/**
 * Columns every merged row carries, `null` when the source has none.
 */
export const GUARANTEED_COLUMNS = [
    COLUMNS.POOL,
    COLUMNS.DOMAIN,
    COLUMNS.NAICS,
    COLUMNS.SIN,
    COLUMNS.UEI,
    COLUMNS.VENDOR_CITY,
    COLUMNS.ZIP_CODE,
] as const;

/**
 * Columns the free-text search looks at.
 */
export const SEARCH_COLUMNS = [
    COLUMNS.VENDOR_DISPLAY,
    COLUMNS.UEI,
    COLUMNS.CONTRACT_NUMBER,
    COLUMNS.CONTRACT_REF,
] as const;

/**
 * Default column projection for table views.
 */
export const DISPLAY_COLUMNS = [
    COLUMNS.VENDOR_DISPLAY,
    COLUMNS.POOL,
    COLUMNS.DOMAIN,
    COLUMNS.SIN,
    COLUMNS.NAICS,
    COLUMNS.CONTRACT_NUMBER,
    COLUMNS.UEI,
    COLUMNS.VENDOR_CITY,
    COLUMNS.ZIP_CODE,
] as const;

/**
 * Defaults for the explorer configuration file.
 */
export const EXPLORER_DEFAULTS = {
    PREVIEW_ROWS: 20,
    TOP_NAICS: 20,
    CACHE_SIZE: 4,
    EXPORT_BASENAME: 'oasis_filtered_export',
    CONFIG_FILENAME: 'award-explorer.yaml',
} as const;
