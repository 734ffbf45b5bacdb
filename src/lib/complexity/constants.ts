/**
 * Scoring constants.
 *
 * Every weight and threshold of the table classifier and the document scorer
 * lives here so each one can be read and tested on its own.
 */

// ============================================================================
// Table classifier
// ============================================================================

/** Share of blank cells above which a table counts as sparse */
export const EMPTY_CELL_RATIO_THRESHOLD = 0.2
export const EMPTY_CELL_WEIGHT = 0.4

/** Population std-dev of row lengths above which rows count as irregular */
export const ROW_LENGTH_STDDEV_THRESHOLD = 1
export const ROW_VARIATION_WEIGHT = 0.3

/** Token count above which a single cell counts as prose */
export const VERBOSE_CELL_TOKEN_LIMIT = 15
export const NESTED_CONTENT_WEIGHT = 0.4

/** Leading rows inspected for header-like content */
export const HEADER_SCAN_ROWS = 3
/** Header-like rows above which headers count as repeated */
export const HEADER_ROW_THRESHOLD = 1
export const REPEATED_HEADER_WEIGHT = 0.3

/** Percentile the mean cell word count is compared against */
export const LEXICAL_DENSITY_PERCENTILE = 75
export const HIGH_DENSITY_WEIGHT = 0.2

/** Highest score still labelled Simple */
export const SIMPLE_TABLE_MAX_SCORE = 0.3
/** Highest score still labelled Moderate */
export const MODERATE_TABLE_MAX_SCORE = 0.6

// ============================================================================
// Format extractors
// ============================================================================

/** Characters a text block or paragraph must exceed to count as dense */
export const DENSE_TEXT_MIN_CHARS = 500

/** Dense blocks on one PDF page above which the page counts as multi-column */
export const PDF_DENSE_BLOCKS_PER_PAGE_LIMIT = 5

/** Dense text shapes in a deck at which it counts as multi-column */
export const SLIDE_DENSE_SHAPES_FOR_COLUMNS = 5

export const SINGLE_COLUMN = 1
export const MULTI_COLUMN = 2

// ============================================================================
// Document scorer
// ============================================================================

export const COMPLEX_TABLE_POINTS = 20
export const COLUMN_POINTS = 20
export const DENSE_PARAGRAPH_POINTS = 5
export const IMAGE_POINTS = 10

/** Final score above which a document is High */
export const HIGH_COMPLEXITY_THRESHOLD = 100
/** Final score above which a document is Medium */
export const MEDIUM_COMPLEXITY_THRESHOLD = 50
