import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Request, Response } from 'express';
import { runCli } from '../../../cli';
import { createCardConfig } from '../../../domain/card/card-config';
import { isRanked } from '../../../domain/stats/percentile';
import { SnapshotStatSource } from '../../../integrations/snapshot/snapshot-stat-source';
import { CARD_LAYOUT, barTop, computeCardPositions } from '../../../modules/cards/card.layout';
import { CardModel, StatRow } from '../../../modules/cards/card.model';
import { CardRenderer } from '../../../modules/cards/card.renderer';
import { CardController } from '../../../modules/cards/cards.controller';
import { CardService } from '../../../modules/cards/cards.service';
import { ReferenceDistributionStore } from '../../../modules/cards/reference-distributions';
import { NotFoundError } from '../../../utils/exceptions';

const SNAPSHOT_PATH = path.resolve(__dirname, '../../../../data/sample-snapshot.json');
const BACKGROUND = [0x1e, 0x1e, 0x1e];

function createPipeline() {
  const config = createCardConfig();
  const source = new SnapshotStatSource(SNAPSHOT_PATH, config);
  const renderer = new CardRenderer(config);
  const service = new CardService(source, new ReferenceDistributionStore(source, config), renderer, config, {
    timezone: 'America/New_York',
    clock: () => new Date('2024-02-14T17:00:00Z'),
  });
  return { renderer, service };
}

function pngSize(png: Buffer): { width: number; height: number } {
  return { width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
}

/** Color just inside the left edge of each row's bar area */
function barPixels(renderer: CardRenderer, model: CardModel): Array<{ row: StatRow; rgb: number[] }> {
  const ctx = renderer.drawCard(model).getContext('2d');
  const positions = computeCardPositions(model.basic.length, model.advanced.length);
  const sample = (rows: readonly StatRow[], rowYs: number[]) =>
    rows.map((row, i) => ({
      row,
      rgb: Array.from(ctx.getImageData(CARD_LAYOUT.row.barX + 1, barTop(rowYs[i]) + 1, 1, 1).data.slice(0, 3)),
    }));
  return [...sample(model.basic, positions.basic.rowYs), ...sample(model.advanced, positions.advanced.rowYs)];
}

function mockRes(): Response {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.set = jest.fn().mockReturnValue(res);
  res.send = jest.fn().mockReturnValue(res);
  return res as Response;
}

describe('card pipeline over the bundled snapshot', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nba-card-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should render an 800x1100 PNG for a known player', async () => {
    const { service } = createPipeline();

    const card = await service.generateCard('lebron james');

    expect(card.player.name).toBe('LeBron James');
    expect(card.player.season).toBe('2023-24');
    expect(card.png.subarray(0, 4)).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    expect(pngSize(card.png)).toEqual({ width: 800, height: 1100 });
  });

  it('should draw bars only on ranked rows', async () => {
    const { renderer, service } = createPipeline();
    const model = await service.buildModel('Rafael Ellison');

    const threePoint = model.basic.find((row) => row.statKey === 'threePointPct');
    expect(threePoint).toMatchObject({ value: null, display: 'N/A' });

    const pixels = barPixels(renderer, model);
    expect(pixels.some(({ row }) => row.value !== null && isRanked(row.percentile))).toBe(true);
    for (const { row, rgb } of pixels) {
      const hasBar = row.value !== null && isRanked(row.percentile);
      if (hasBar) {
        expect({ statKey: row.statKey, rgb }).not.toEqual({ statKey: row.statKey, rgb: BACKGROUND });
      } else {
        expect({ statKey: row.statKey, rgb }).toEqual({ statKey: row.statKey, rgb: BACKGROUND });
      }
    }
  });

  it('should fail with NotFoundError before rendering an unknown player', async () => {
    const { renderer, service } = createPipeline();
    const renderSpy = jest.spyOn(renderer, 'render');

    await expect(service.generateCard('Zzyzx Qwertyuiop')).rejects.toBeInstanceOf(NotFoundError);
    expect(renderSpy).not.toHaveBeenCalled();
  });

  it('should write the same bytes from the CLI as the route sends', async () => {
    const { service } = createPipeline();
    const res = mockRes();

    await new CardController(service).getCard({ query: { player: 'LeBron James' } } as unknown as Request, res);
    const exitCode = await runCli(['LeBron', 'James'], { cardService: service, cardsDir: tmpDir });

    expect(exitCode).toBe(0);
    const sent: unknown = jest.mocked(res.send).mock.calls[0][0];
    if (!Buffer.isBuffer(sent)) throw new Error('expected a PNG buffer body');
    const written = fs.readFileSync(path.join(tmpDir, 'lebron_james_stats_card.png'));
    expect(written.equals(sent)).toBe(true);
  });

  it('should fit a very long name without changing the canvas size', async () => {
    const { renderer, service } = createPipeline();
    const model = await service.buildModel('LeBron James');
    const longName = 'Bartholomew Maximilian Fitzgerald-Worthington 🏀 the Third of Sacramento';

    const png = await renderer.render({ ...model, player: { ...model.player, name: longName } });

    expect(pngSize(png)).toEqual({ width: 800, height: 1100 });
  });
});
