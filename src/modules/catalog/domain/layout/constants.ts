/** Points per inch in PDF user space. */
export const INCH = 72;

/** US Letter. */
export const PAGE_WIDTH = 612;
export const PAGE_HEIGHT = 792;

export const PRODUCTS_PER_PAGE = 6;
export const GRID_COLUMNS = 2;

export const PAGE_MARGIN = 0.5 * INCH;
export const ROW_SPACING = 3.5 * INCH;
export const COLUMN_SPACING = 4 * INCH;

export const IMAGE_DISPLAY_WIDTH = 2 * INCH;
export const DEFAULT_IMAGE_DISPLAY_HEIGHT = 2 * INCH;

export const TEXT_OFFSET_X = 169.2;
export const TITLE_OFFSET_Y = 50;
export const TITLE_WRAP_WIDTH = 15;
export const STOCK_BLOCK_OFFSET_Y = 168;

export const TIMESTAMP_X = PAGE_WIDTH - 130;
export const TIMESTAMP_BASELINE = 20;
export const TIMESTAMP_FONT_SIZE = 10;
