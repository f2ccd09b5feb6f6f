import { ConfigurationError, InvalidRequestError, MalformedResponseError } from '../../src/grouping/errors.js';
import { createOrchestrator, type OrchestratorOptions } from '../../src/grouping/orchestrator.js';
import type {
  AnalysisTier,
  HolisticGroup,
  HolisticGrouper,
  TierStrategy,
  UploadedImage,
  VisionAttributes,
} from '../../src/grouping/types.js';
import { createRequestLogger } from '../../src/lib/request-logger.js';
import { attrs, CREAM_SOFA, expectPartition, IVORY_LOVESEAT, makeImage, OAK_DESK, QUEEN_BED, RED_CHAIR } from './fixtures.js';

type Behavior = (image: UploadedImage) => Promise<VisionAttributes>;

function fakeTier(tier: 'PRIMARY' | 'SECONDARY', behavior: Behavior, available = true) {
  const calls: string[] = [];
  const strategy: TierStrategy = {
    tier,
    label: tier === 'PRIMARY' ? 'AI workflow analysis' : 'multi-agent analysis',
    available: () => available,
    analyze: (image) => {
      calls.push(image.imageId);
      return behavior(image);
    },
  };
  return { strategy, calls };
}

function fakeGrouper(answer: (ids: string[]) => Promise<HolisticGroup[]>) {
  const calls: string[][] = [];
  const grouper: HolisticGrouper = {
    available: () => true,
    groupHolistically: (analyses) => {
      const ids = analyses.map((a) => a.imageId);
      calls.push(ids);
      return answer(ids);
    },
  };
  return { grouper, calls };
}

const singletonAnswer = async (ids: string[]): Promise<HolisticGroup[]> =>
  ids.map((id) => ({ imageIds: [id], reasoning: 'distinct item', confidence: 0.9 }));

const never = () => new Promise<VisionAttributes>(() => undefined);

const fail = (err: unknown) => async (): Promise<VisionAttributes> => {
  throw err;
};

function build(options: OrchestratorOptions) {
  return createOrchestrator({
    callTimeoutMs: 25,
    retryDelayMs: 0,
    createLogger: () => createRequestLogger({ echo: false }),
    now: () => new Date('2026-04-01T00:00:00.000Z'),
    newRequestId: () => 'req-test',
    ...options,
  });
}

const CATALOG: Record<string, Partial<VisionAttributes>> = {
  img_0: IVORY_LOVESEAT,
  img_1: OAK_DESK,
  img_2: RED_CHAIR,
  img_3: CREAM_SOFA,
  img_4: QUEEN_BED,
};

const byCatalog = async (image: UploadedImage) => attrs(CATALOG[image.imageId] ?? {});

describe('createOrchestrator', () => {
  it('rejects invalid thresholds at construction', () => {
    expect(() => build({ thresholds: { strong: 1.5, category: 0.6, furnitureType: 0.5 } })).toThrow(
      ConfigurationError
    );
  });

  it('rejects invalid template defaults at construction', () => {
    expect(() =>
      build({
        template: {
          titlePrefix: 'Item',
          price: -1,
          condition: 'Good',
          confidence: 0.5,
          category: 'Furniture',
          description: 'x',
        },
      })
    ).toThrow(ConfigurationError);
  });
});

describe('orchestrator.run', () => {
  const images = [0, 1, 2, 3, 4].map((i) => makeImage(i));

  it('rejects an empty batch and duplicate ids', async () => {
    const orchestrator = build({});
    await expect(orchestrator.run([])).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(orchestrator.run([makeImage(0, 'a'), makeImage(1, 'a')])).rejects.toThrow('Duplicate image ids: a');
  });

  it('finishes on PRIMARY without a warning when everything succeeds', async () => {
    const primary = fakeTier('PRIMARY', byCatalog);
    const secondary = fakeTier('SECONDARY', byCatalog);
    const { grouper } = fakeGrouper(async () => [
      { imageIds: ['img_0', 'img_3'], reasoning: 'same loveseat', confidence: 0.95 },
      { imageIds: ['img_1'], reasoning: 'desk', confidence: 0.9 },
      { imageIds: ['img_2'], reasoning: 'chair', confidence: 0.9 },
      { imageIds: ['img_4'], reasoning: 'bed', confidence: 0.9 },
    ]);

    const outcome = await build({ primary: primary.strategy, secondary: secondary.strategy, grouper }).run(images);

    expect(outcome.state).toBe('DONE');
    expect(outcome.warning).toBeUndefined();
    expect(outcome.tiersVisited).toEqual(['PRIMARY']);
    expect(outcome.groupingMethod).toBe('ai');
    expect(secondary.calls).toEqual([]);
    expect(outcome.listings).toHaveLength(4);
    expect(outcome.listings[0].images.map((i) => i.imageId)).toEqual(['img_0', 'img_3']);
    expect(outcome.requestId).toBe('req-test');
    expect(outcome.errors).toEqual([]);
  });

  it('retries timed-out images on SECONDARY and labels each image with its tier', async () => {
    const primary = fakeTier('PRIMARY', (image) =>
      image.imageId === 'img_3' || image.imageId === 'img_4' ? never() : byCatalog(image)
    );
    const secondary = fakeTier('SECONDARY', byCatalog);
    const { grouper, calls: groupingCalls } = fakeGrouper(singletonAnswer);
    const transitions: Array<[AnalysisTier, string[]]> = [];

    const outcome = await build({
      primary: primary.strategy,
      secondary: secondary.strategy,
      grouper,
      onTierChange: (tier, ids) => transitions.push([tier, ids]),
    }).run(images);

    expect(transitions).toEqual([
      ['PRIMARY', ['img_0', 'img_1', 'img_2', 'img_3', 'img_4']],
      ['SECONDARY', ['img_3', 'img_4']],
    ]);
    // one in-place retry per timed-out image
    expect(primary.calls.filter((id) => id === 'img_3')).toHaveLength(2);
    expect(secondary.calls).toEqual(['img_3', 'img_4']);
    expect(groupingCalls).toEqual([['img_0', 'img_1', 'img_2']]);

    expect(outcome.tierByImage).toEqual({
      img_0: 'PRIMARY',
      img_1: 'PRIMARY',
      img_2: 'PRIMARY',
      img_3: 'SECONDARY',
      img_4: 'SECONDARY',
    });
    expect(outcome.tiersVisited).toEqual(['PRIMARY', 'SECONDARY']);
    expect(outcome.state).toBe('DONE');
    expect(outcome.warning).toBe('Degraded analysis: 2 of 5 images analyzed by multi-agent analysis');

    // img_3 (cream sofa) joins the loveseat group formed on PRIMARY
    expect(outcome.groups.map((g) => g.imageIds)).toEqual([['img_0', 'img_3'], ['img_1'], ['img_2'], ['img_4']]);
    expectPartition(outcome.groups, images.map((i) => i.imageId));
    expect(outcome.listings[0].images).toEqual([
      { imageId: 'img_0', reference: 'img_0.jpg', tier: 'PRIMARY' },
      { imageId: 'img_3', reference: 'img_3.jpg', tier: 'SECONDARY' },
    ]);
    expect(outcome.listings[0].analysisMethod).toBe('PRIMARY');
    expect(outcome.listings[3].analysisMethod).toBe('SECONDARY');

    expect(outcome.errors.map((e) => [e.tier, e.imageId, e.code])).toEqual([
      ['PRIMARY', 'img_3', 'TRANSIENT_PROVIDER'],
      ['PRIMARY', 'img_4', 'TRANSIENT_PROVIDER'],
    ]);
    expect(outcome.metrics.byTier).toEqual({ PRIMARY: 3, SECONDARY: 2, TERTIARY: 0 });
  });

  it('falls to template singletons with a warning when every call fails', async () => {
    const four = images.slice(0, 4);
    const primary = fakeTier('PRIMARY', fail(Object.assign(new Error('upstream'), { status: 503 })));
    const secondary = fakeTier('SECONDARY', fail(new MalformedResponseError('not JSON')));
    const { grouper, calls: groupingCalls } = fakeGrouper(singletonAnswer);

    const outcome = await build({ primary: primary.strategy, secondary: secondary.strategy, grouper }).run(four);

    expect(outcome.tiersVisited).toEqual(['PRIMARY', 'SECONDARY', 'TERTIARY']);
    expect(primary.calls).toHaveLength(8);
    expect(secondary.calls).toHaveLength(4);
    expect(groupingCalls).toEqual([]);

    expect(outcome.state).toBe('DONE');
    expect(outcome.groupingMethod).toBe('template');
    expect(outcome.warning).toBe('Degraded analysis: 4 of 4 images analyzed by template defaults');
    expect(outcome.listings.map((l) => [l.title, l.price, l.condition, l.analysisMethod, l.images.length])).toEqual([
      ['Quality Furniture Item 1', 150, 'Used - Good', 'TERTIARY', 1],
      ['Quality Furniture Item 2', 150, 'Used - Good', 'TERTIARY', 1],
      ['Quality Furniture Item 3', 150, 'Used - Good', 'TERTIARY', 1],
      ['Quality Furniture Item 4', 150, 'Used - Good', 'TERTIARY', 1],
    ]);
    expectPartition(outcome.groups, four.map((i) => i.imageId));
  });

  it('ends PARTIAL when some images were analyzed and others fell to templates', async () => {
    const two = images.slice(0, 2);
    const primary = fakeTier('PRIMARY', (image) =>
      image.imageId === 'img_1' ? fail(new MalformedResponseError('bad'))() : byCatalog(image)
    );
    const { grouper } = fakeGrouper(singletonAnswer);

    const outcome = await build({ primary: primary.strategy, grouper }).run(two);

    // malformed responses are not retried in place
    expect(primary.calls).toEqual(['img_0', 'img_1']);
    expect(outcome.state).toBe('PARTIAL');
    expect(outcome.tiersVisited).toEqual(['PRIMARY', 'TERTIARY']);
    expect(outcome.tierByImage).toEqual({ img_0: 'PRIMARY', img_1: 'TERTIARY' });
    expect(outcome.warning).toBe('Degraded analysis: 1 of 2 images analyzed by template defaults');
    expect(outcome.errors.map((e) => [e.tier, e.imageId, e.code])).toEqual([
      ['PRIMARY', 'img_1', 'MALFORMED_RESPONSE'],
      ['SECONDARY', null, 'PROVIDER_UNAVAILABLE'],
    ]);
    expect(outcome.listings.map((l) => l.title)).toEqual(['ivory Modern Loveseat', 'Quality Furniture Item 2']);
  });

  it('skips an unavailable tier without calling it', async () => {
    const primary = fakeTier('PRIMARY', byCatalog, false);
    const secondary = fakeTier('SECONDARY', byCatalog);
    const transitions: AnalysisTier[] = [];

    const outcome = await build({
      primary: primary.strategy,
      secondary: secondary.strategy,
      onTierChange: (tier) => transitions.push(tier),
    }).run(images.slice(0, 3));

    expect(primary.calls).toEqual([]);
    expect(transitions).toEqual(['SECONDARY']);
    expect(outcome.tiersVisited).toEqual(['SECONDARY']);
    expect(outcome.groupingMethod).toBe('heuristic');
    expect(outcome.errors[0]).toEqual({
      tier: 'PRIMARY',
      imageId: null,
      code: 'PROVIDER_UNAVAILABLE',
      message: 'PRIMARY analysis unavailable',
    });
    expect(outcome.warning).toBe('Degraded analysis: 3 of 3 images analyzed by multi-agent analysis');
  });

  it('degrades to heuristic grouping when the holistic call fails', async () => {
    const primary = fakeTier('PRIMARY', byCatalog);
    const { grouper, calls } = fakeGrouper(async () => {
      throw new Error('connection reset');
    });

    const outcome = await build({ primary: primary.strategy, grouper }).run(images);

    expect(calls).toHaveLength(2);
    expect(outcome.groupingMethod).toBe('heuristic');
    expect(outcome.state).toBe('DONE');
    expect(outcome.warning).toBe('Degraded analysis: AI grouping unavailable, used heuristic grouping');
    expect(outcome.groups.map((g) => g.imageIds)).toEqual([['img_0', 'img_3'], ['img_1'], ['img_2'], ['img_4']]);
  });

  it('does not retry in place when retries are disabled', async () => {
    const primary = fakeTier('PRIMARY', fail(Object.assign(new Error('slow down'), { status: 429 })));

    await build({ primary: primary.strategy, inPlaceRetries: 0 }).run(images.slice(0, 2));

    expect(primary.calls).toEqual(['img_0', 'img_1']);
  });

  it('never retries in place more than once', async () => {
    const primary = fakeTier('PRIMARY', fail(Object.assign(new Error('slow down'), { status: 429 })));

    await build({ primary: primary.strategy, inPlaceRetries: 5 }).run(images.slice(0, 1));

    expect(primary.calls).toEqual(['img_0', 'img_0']);
  });

  it('treats an unparsable strategy answer as a failure for that image', async () => {
    const primary = fakeTier('PRIMARY', async () => attrs({ confidence: Number.NaN }));

    const outcome = await build({ primary: primary.strategy }).run(images.slice(0, 1));

    expect(outcome.errors.map((e) => e.code)).toContain('MALFORMED_RESPONSE');
    expect(outcome.tierByImage).toEqual({ img_0: 'TERTIARY' });
  });

  it('keeps descending monotonically and covers every image', async () => {
    const primary = fakeTier('PRIMARY', (image) =>
      Number(image.imageId.slice(4)) % 2 === 0 ? byCatalog(image) : fail(new Error('flaky'))()
    );
    const secondary = fakeTier('SECONDARY', (image) =>
      image.imageId === 'img_1' ? byCatalog(image) : fail(new Error('flaky'))()
    );
    const { grouper } = fakeGrouper(singletonAnswer);

    const outcome = await build({ primary: primary.strategy, secondary: secondary.strategy, grouper }).run(images);

    const order = ['PRIMARY', 'SECONDARY', 'TERTIARY'];
    const visited = outcome.tiersVisited.map((t) => order.indexOf(t));
    expect(visited).toEqual([0, 1, 2]);
    expect(outcome.tierByImage).toEqual({
      img_0: 'PRIMARY',
      img_1: 'SECONDARY',
      img_2: 'PRIMARY',
      img_3: 'TERTIARY',
      img_4: 'PRIMARY',
    });
    expect(outcome.state).toBe('PARTIAL');
    expect(outcome.warning).toBe(
      'Degraded analysis: 1 of 5 images analyzed by multi-agent analysis; 1 of 5 images analyzed by template defaults'
    );
    expectPartition(outcome.groups, images.map((i) => i.imageId));
    expect(outcome.listings.flatMap((l) => l.images.map((i) => i.imageId)).sort()).toEqual(
      images.map((i) => i.imageId)
    );
  });

  it('returns the run log under a request-scoped prefix', async () => {
    const infoSpy = jest.spyOn(console, 'info').mockImplementation();
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    try {
      const primary = fakeTier('PRIMARY', byCatalog);
      const outcome = await createOrchestrator({
        primary: primary.strategy,
        newRequestId: () => 'req-log',
      }).run(images.slice(0, 1));

      expect(outcome.log[0]).toMatchObject({
        level: 'info',
        msg: '[orchestrator req-log] Entering PRIMARY with 1 image(s)',
        data: { pending: ['img_0'] },
      });
      expect(infoSpy).toHaveBeenCalledWith('[INFO] [orchestrator req-log] Entering PRIMARY with 1 image(s)', {
        pending: ['img_0'],
      });
    } finally {
      infoSpy.mockRestore();
      warnSpy.mockRestore();
    }
  });
});
