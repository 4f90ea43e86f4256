/**
 * Card Layout
 *
 * Fixed geometry for every card: canvas size, text sizes and the x/y
 * positions of each block. All cards share these numbers so batch output
 * lines up. Coordinates are in pixels from the top-left corner; text is drawn
 * with a 'top' baseline.
 */

export const CARD_LAYOUT = Object.freeze({
  width: 800,
  height: 1100,
  margin: 40,
  fontFamily: 'sans-serif',

  header: Object.freeze({
    nameY: 40,
    nameSize: 40,
    nameMinSize: 24,
    infoY: 96,
    infoSize: 24,
    infoMinSize: 16,
    seasonY: 132,
    seasonSize: 18,
    dividerY: 166,
    dividerHeight: 2,
  }),

  block: Object.freeze({
    firstY: 184,
    titleSize: 26,
    titleHeight: 44,
    gap: 20,
  }),

  row: Object.freeze({
    height: 36,
    textSize: 20,
    labelX: 40,
    valueX: 300,
    barX: 330,
    barWidth: 330,
    barHeight: 18,
    percentileX: 760,
  }),

  footer: Object.freeze({
    dateY: 1040,
    sourceY: 1068,
    textSize: 16,
  }),
});

export interface BlockPosition {
  titleY: number;
  /** Top edge of each row */
  rowYs: number[];
  /** First y below the block */
  endY: number;
}

export interface CardPositions {
  basic: BlockPosition;
  advanced: BlockPosition;
}

function layoutBlock(titleY: number, rowCount: number): BlockPosition {
  const firstRowY = titleY + CARD_LAYOUT.block.titleHeight;
  const rowYs = Array.from({ length: rowCount }, (_, i) => firstRowY + i * CARD_LAYOUT.row.height);
  return { titleY, rowYs, endY: firstRowY + rowCount * CARD_LAYOUT.row.height };
}

export function computeCardPositions(basicCount: number, advancedCount: number): CardPositions {
  const basic = layoutBlock(CARD_LAYOUT.block.firstY, basicCount);
  const advanced = layoutBlock(basic.endY + CARD_LAYOUT.block.gap, advancedCount);
  return { basic, advanced };
}

/** Last y a stat row may reach before running into the footer */
export const CONTENT_BOTTOM = CARD_LAYOUT.footer.dateY - 16;

/** Top edge of the bar inside a row starting at rowY */
export function barTop(rowY: number): number {
  return rowY + (CARD_LAYOUT.row.height - CARD_LAYOUT.row.barHeight) / 2;
}

/** Filled bar width for a percentile, in whole pixels */
export function barFillWidth(percentile: number): number {
  return Math.round((CARD_LAYOUT.row.barWidth * Math.min(100, Math.max(0, percentile))) / 100);
}
