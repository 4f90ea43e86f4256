/**
 * Card Configuration
 *
 * Built once at startup and shared by reference with the percentile engine,
 * the card service and the renderer. The returned object and everything
 * reachable from it is frozen.
 */

import { DEFAULT_STAT_DEFINITIONS, StatDefinition } from '../stats/stat-definitions';
import { ColorScale, isHexColor } from './color-scale';

export interface CardPalette {
  readonly background: string;
  readonly text: string;
  readonly muted: string;
  readonly track: string;
  readonly divider: string;
}

export interface CardConfig {
  readonly statDefinitions: readonly StatDefinition[];
  readonly colorScale: ColorScale;
  readonly palette: CardPalette;
}

export const DEFAULT_COLOR_SCALE: ColorScale = {
  low: '#ff4b4b',
  high: '#4b9eff',
};

export const DEFAULT_PALETTE: CardPalette = {
  background: '#1e1e1e',
  text: '#ffffff',
  muted: '#9a9a9a',
  track: '#2e2e2e',
  divider: '#3a3a3a',
};

export interface CardConfigOptions {
  statDefinitions?: readonly StatDefinition[];
  colorScale?: Partial<ColorScale>;
  palette?: Partial<CardPalette>;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function createCardConfig(options: CardConfigOptions = {}): CardConfig {
  const statDefinitions = (options.statDefinitions ?? DEFAULT_STAT_DEFINITIONS).map((d) => ({
    ...d,
    source: { ...d.source },
  }));

  const seen = new Set<string>();
  for (const definition of statDefinitions) {
    if (seen.has(definition.key)) {
      throw new Error(`Duplicate stat definition: ${definition.key}`);
    }
    seen.add(definition.key);
  }

  const colorScale: ColorScale = { ...DEFAULT_COLOR_SCALE, ...options.colorScale };
  const palette: CardPalette = { ...DEFAULT_PALETTE, ...options.palette };

  for (const [name, color] of [...Object.entries(colorScale), ...Object.entries(palette)]) {
    if (!isHexColor(color)) {
      throw new Error(`Invalid card color ${name}="${color}": expected #rrggbb`);
    }
  }

  return deepFreeze({ statDefinitions, colorScale, palette });
}

export function getStatDefinition(config: CardConfig, statKey: string): StatDefinition | undefined {
  return config.statDefinitions.find((d) => d.key === statKey);
}
