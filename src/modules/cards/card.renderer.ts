import { Canvas, GlobalFonts, SKRSContext2D, createCanvas } from '@napi-rs/canvas';
import { logger } from '../../config/logger.config';
import { CardConfig } from '../../domain/card/card-config';
import { percentileColor } from '../../domain/card/color-scale';
import { ordinal } from '../../domain/card/format';
import { fitText } from '../../domain/card/text-fit';
import { isRanked } from '../../domain/stats/percentile';
import { RenderError } from '../../utils/exceptions';
import { CardModel, StatRow } from './card.model';
import {
  CARD_LAYOUT,
  CONTENT_BOTTOM,
  barFillWidth,
  barTop,
  computeCardPositions,
} from './card.layout';

const CUSTOM_FONT_FAMILY = 'CardFont';

export interface CardRendererOptions {
  /** TTF/OTF file to draw all text with. The platform sans-serif font is used when unset. */
  fontPath?: string;
}

type FontWeight = 'normal' | 'bold';

/**
 * Draws a CardModel onto a fixed-size canvas and encodes it as PNG.
 * Output depends only on the model (and the configured font).
 */
export class CardRenderer {
  private fontFamily: string | null = null;

  constructor(
    private readonly config: CardConfig,
    private readonly options: CardRendererOptions = {}
  ) {}

  async render(model: CardModel): Promise<Buffer> {
    const canvas = this.drawCard(model);
    return canvas.encode('png');
  }

  /**
   * Draw in fixed order: background, header, basic block, advanced block, footer.
   */
  drawCard(model: CardModel): Canvas {
    const positions = computeCardPositions(model.basic.length, model.advanced.length);
    if (positions.advanced.endY > CONTENT_BOTTOM) {
      throw new RenderError(
        `Card layout overflow: ${model.basic.length + model.advanced.length} stat rows do not fit`
      );
    }

    const family = this.resolveFontFamily();
    const canvas = createCanvas(CARD_LAYOUT.width, CARD_LAYOUT.height);
    const ctx = canvas.getContext('2d');
    ctx.textBaseline = 'top';

    const { palette } = this.config;
    ctx.fillStyle = palette.background;
    ctx.fillRect(0, 0, CARD_LAYOUT.width, CARD_LAYOUT.height);

    this.drawHeader(ctx, model, family);

    this.drawBlockTitle(ctx, 'Basic Stats', positions.basic.titleY, family);
    model.basic.forEach((row, i) => this.drawRow(ctx, row, positions.basic.rowYs[i], family));

    this.drawBlockTitle(ctx, 'Advanced Stats', positions.advanced.titleY, family);
    model.advanced.forEach((row, i) => this.drawRow(ctx, row, positions.advanced.rowYs[i], family));

    this.drawFooter(ctx, model, family);
    return canvas;
  }

  private resolveFontFamily(): string {
    if (this.fontFamily) return this.fontFamily;

    const fontPath = this.options.fontPath;
    if (!fontPath) {
      this.fontFamily = CARD_LAYOUT.fontFamily;
      return this.fontFamily;
    }

    let fontKey: ReturnType<typeof GlobalFonts.registerFromPath>;
    try {
      fontKey = GlobalFonts.registerFromPath(fontPath, CUSTOM_FONT_FAMILY);
    } catch (error) {
      throw new RenderError(`Could not load card font from ${fontPath}: ${String(error)}`);
    }
    if (!fontKey) {
      throw new RenderError(`Could not load card font from ${fontPath}`);
    }
    logger.info('Registered card font', { fontPath });
    this.fontFamily = CUSTOM_FONT_FAMILY;
    return this.fontFamily;
  }

  private setFont(ctx: SKRSContext2D, size: number, family: string, weight: FontWeight = 'normal') {
    ctx.font = `${weight === 'bold' ? 'bold ' : ''}${size}px ${family}`;
  }

  private drawFittedText(
    ctx: SKRSContext2D,
    text: string,
    y: number,
    size: number,
    minSize: number,
    family: string,
    weight: FontWeight
  ) {
    const maxWidth = CARD_LAYOUT.width - 2 * CARD_LAYOUT.margin;
    const fitted = fitText(text, { maxWidth, fontSize: size, minFontSize: minSize }, (candidate, fontSize) => {
      this.setFont(ctx, fontSize, family, weight);
      return ctx.measureText(candidate).width;
    });
    this.setFont(ctx, fitted.fontSize, family, weight);
    ctx.fillText(fitted.text, CARD_LAYOUT.margin, y);
  }

  private drawHeader(ctx: SKRSContext2D, model: CardModel, family: string) {
    const { header, margin, width } = CARD_LAYOUT;
    const { player } = model;
    const { palette } = this.config;

    ctx.fillStyle = palette.text;
    this.drawFittedText(ctx, player.name, header.nameY, header.nameSize, header.nameMinSize, family, 'bold');

    const info = [player.team, player.teamName, player.position].filter((part) => part).join(' | ');
    this.drawFittedText(ctx, info, header.infoY, header.infoSize, header.infoMinSize, family, 'normal');

    ctx.fillStyle = palette.muted;
    this.setFont(ctx, header.seasonSize, family);
    ctx.fillText(`${player.season} Regular Season`, margin, header.seasonY);

    ctx.fillStyle = palette.divider;
    ctx.fillRect(margin, header.dividerY, width - 2 * margin, header.dividerHeight);
  }

  private drawBlockTitle(ctx: SKRSContext2D, title: string, y: number, family: string) {
    ctx.fillStyle = this.config.palette.text;
    this.setFont(ctx, CARD_LAYOUT.block.titleSize, family, 'bold');
    ctx.fillText(title, CARD_LAYOUT.margin, y);
  }

  private drawRow(ctx: SKRSContext2D, row: StatRow, y: number, family: string) {
    const { row: layout } = CARD_LAYOUT;
    const { palette, colorScale } = this.config;
    const textY = y + (layout.height - layout.textSize) / 2;

    this.setFont(ctx, layout.textSize, family);
    ctx.fillStyle = palette.text;
    ctx.fillText(row.label, layout.labelX, textY);

    ctx.textAlign = 'right';
    ctx.fillStyle = row.value === null ? palette.muted : palette.text;
    ctx.fillText(row.display, layout.valueX, textY);
    ctx.textAlign = 'left';

    // Missing or unranked: no bar
    if (row.value === null || !isRanked(row.percentile)) return;

    const top = barTop(y);
    ctx.fillStyle = palette.track;
    ctx.fillRect(layout.barX, top, layout.barWidth, layout.barHeight);

    const fill = barFillWidth(row.percentile);
    if (fill > 0) {
      ctx.fillStyle = percentileColor(colorScale, row.percentile);
      ctx.fillRect(layout.barX, top, fill, layout.barHeight);
    }

    ctx.textAlign = 'right';
    ctx.fillStyle = palette.muted;
    ctx.fillText(ordinal(row.percentile), layout.percentileX, textY);
    ctx.textAlign = 'left';
  }

  private drawFooter(ctx: SKRSContext2D, model: CardModel, family: string) {
    const { footer, margin } = CARD_LAYOUT;
    ctx.fillStyle = this.config.palette.muted;
    this.setFont(ctx, footer.textSize, family);

    if (model.asOf) {
      ctx.fillText(`Generated on ${model.asOf}`, margin, footer.dateY);
    }
    ctx.fillText(model.attribution, margin, footer.sourceY);
  }
}
