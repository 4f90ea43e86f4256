import { createCardConfig } from '../../../domain/card/card-config';
import { ReferenceDistributionStore } from '../../../modules/cards/reference-distributions';
import { TEST_SEASON, createLeagueSample, createMockStatSource } from '../../helpers/card-fixtures';

describe('ReferenceDistributionStore', () => {
  const config = createCardConfig();

  it('should build sorted distributions from the league sample', async () => {
    const source = createMockStatSource(undefined, createLeagueSample(4));
    const store = new ReferenceDistributionStore(source, config);

    await store.load(TEST_SEASON);

    expect(source.fetchLeagueSample).toHaveBeenCalledWith(TEST_SEASON);
    expect(store.getDistribution(TEST_SEASON, 'points')).toEqual([1, 2, 3, 4]);
    expect(store.getDistribution(TEST_SEASON, 'assists')).toBeUndefined();
  });

  it('should return undefined for a season that was never loaded', () => {
    const store = new ReferenceDistributionStore(createMockStatSource(), config);
    expect(store.getDistribution('2019-20', 'points')).toBeUndefined();
  });

  it('should fetch each season once while cached', async () => {
    const source = createMockStatSource();
    const store = new ReferenceDistributionStore(source, config);

    await Promise.all([store.load(TEST_SEASON), store.load(TEST_SEASON)]);
    await store.load(TEST_SEASON);

    expect(source.fetchLeagueSample).toHaveBeenCalledTimes(1);
  });

  it('should propagate source failures', async () => {
    const source = createMockStatSource();
    source.fetchLeagueSample.mockRejectedValueOnce(new Error('source down'));
    const store = new ReferenceDistributionStore(source, config);

    await expect(store.load(TEST_SEASON)).rejects.toThrow('source down');
    expect(store.getDistribution(TEST_SEASON, 'points')).toBeUndefined();
  });
});
