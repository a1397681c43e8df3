import { describe, it, expect } from 'vitest';
import type { DocumentClient } from 'aws-sdk/clients/dynamodb';
import { Priority, RecommendationCategory } from '../src/types/core';
import type { Recommendation } from '../src/types/recommendation';
import { DynamoDBHelper, DynamoItem, QueryOptions } from '../src/shared/utils/dynamodb-helper';
import { createDynamoRepositories } from '../src/persistence/dynamodb-repositories';
import { AS_OF, buildObservation, buildPrediction, testConfig, testLogger } from './support/fixtures';

/**
 * Helper that records every call and answers from canned results instead of DynamoDB
 */
class RecordingHelper extends DynamoDBHelper {
  readonly puts: Array<{ tableName: string; item: DynamoItem; partitionKeyName?: string }> = [];
  readonly gets: Array<{ tableName: string; key: DocumentClient.Key }> = [];
  readonly queries: Array<{ tableName: string; options: QueryOptions }> = [];
  readonly batches: Array<{ tableName: string; items: DynamoItem[] }> = [];
  getResult: DynamoItem | null = null;
  queryResult: DynamoItem[] = [];
  putIfAbsentResult = true;

  constructor() {
    super(testLogger());
  }

  override async putItem(tableName: string, item: DynamoItem): Promise<void> {
    this.puts.push({ tableName, item });
  }

  override async putItemIfAbsent(tableName: string, item: DynamoItem, partitionKeyName: string): Promise<boolean> {
    this.puts.push({ tableName, item, partitionKeyName });
    return this.putIfAbsentResult;
  }

  override async getItem(tableName: string, key: DocumentClient.Key): Promise<DynamoItem | null> {
    this.gets.push({ tableName, key });
    return this.getResult;
  }

  override async queryItems(tableName: string, options: QueryOptions): Promise<DynamoItem[]> {
    this.queries.push({ tableName, options });
    return this.queryResult;
  }

  override async scanItems(): Promise<DynamoItem[]> {
    return this.queryResult;
  }

  override async batchWriteItems(tableName: string, items: DynamoItem[]): Promise<void> {
    this.batches.push({ tableName, items });
  }

  override generateTTL(daysFromNow: number): number {
    return 1700000000 + daysFromNow;
  }
}

function setup() {
  const helper = new RecordingHelper();
  const repositories = createDynamoRepositories(testConfig(), testLogger(), helper);
  return { helper, repositories };
}

function storedRecommendation(overrides: DynamoItem = {}): DynamoItem {
  return {
    id: 'rec-1',
    sessionId: 'session-1',
    recommendationDate: AS_OF,
    category: 'IRRIGATION',
    priority: 'HIGH',
    title: 'Increase Irrigation - Drought Stress Detected',
    description: 'Irrigate.',
    isViewed: false,
    isImplemented: true,
    createdAt: '2024-06-30T09:00:00.000Z',
    updatedAt: '2024-06-30T09:00:01.000Z',
    ...overrides,
  };
}

describe('DynamoWeatherObservationRepository', () => {
  it('writes conditionally with a retention TTL and no undefined attributes', async () => {
    const { helper, repositories } = setup();
    helper.putIfAbsentResult = false;

    const inserted = await repositories.weatherObservations.upsert(buildObservation(AS_OF, { solarRadiation: undefined }));

    expect(inserted).toBe(false);
    expect(helper.puts).toHaveLength(1);
    expect(helper.puts[0].tableName).toBe('YieldAdvisor-WeatherObservations');
    expect(helper.puts[0].partitionKeyName).toBe('farmId');
    expect(helper.puts[0].item.ttl).toBe(1700000730);
    expect('solarRadiation' in helper.puts[0].item).toBe(false);
  });

  it('queries a date range on the sort key', async () => {
    const { helper, repositories } = setup();
    helper.queryResult = [{ ...buildObservation('2024-06-29'), ttl: 1700000730 }];

    const observations = await repositories.weatherObservations.findByFarmAndDateRange('farm-1', '2024-06-23', AS_OF);

    expect(observations).toEqual([{ ...buildObservation('2024-06-29'), solarRadiation: undefined }]);
    expect(helper.queries[0].options.expressionAttributeValues).toEqual({
      ':farmId': 'farm-1',
      ':start': '2024-06-23',
      ':end': AS_OF,
    });
  });

  it('rejects an unknown source', async () => {
    const { helper, repositories } = setup();
    helper.getResult = { ...buildObservation(AS_OF), source: 'Almanac' };

    await expect(repositories.weatherObservations.findByFarmAndDate('farm-1', AS_OF)).rejects.toThrow(
      'Malformed item in YieldAdvisor-WeatherObservations: unknown source Almanac'
    );
  });
});

describe('DynamoYieldPredictionRepository', () => {
  it('stores the prediction under a date-ordered sort key', async () => {
    const { helper, repositories } = setup();

    await repositories.yieldPredictions.save(buildPrediction());

    expect(helper.puts[0].item.predictionKey).toBe('2024-06-30#2024-06-30T08:00:00.000Z#prediction-1');
  });

  it('bounds the history query on the sort key', async () => {
    const { helper, repositories } = setup();

    await repositories.yieldPredictions.findBySession('session-1', '2024-06-01', AS_OF);
    await repositories.yieldPredictions.findBySession('session-1');

    expect(helper.queries.map(query => query.options.expressionAttributeValues)).toEqual([
      { ':sessionId': 'session-1', ':from': '2024-06-01', ':to': '2024-06-30#\uffff' },
      { ':sessionId': 'session-1', ':from': '0000-00-00', ':to': '9999-12-31#\uffff' },
    ]);
  });

  it('reads back a frozen prediction and drops unknown features and factors', async () => {
    const { helper, repositories } = setup();
    helper.queryResult = [
      {
        ...buildPrediction(),
        featuresUsed: ['PlantingDate', 'SatelliteData'],
        factors: [
          { factor: 'Soil Quality', importance: 0.3, effect: 'POSITIVE', description: 'Soil composition' },
          { factor: 'Unknown', importance: 0.1, effect: 'MIXED' },
        ],
        predictionKey: '2024-06-30#2024-06-30T08:00:00.000Z#prediction-1',
      },
    ];

    const latest = await repositories.yieldPredictions.findLatestBySession('session-1');

    expect(latest?.featuresUsed).toEqual(['PlantingDate']);
    expect(latest?.factors).toEqual([
      { factor: 'Soil Quality', importance: 0.3, effect: 'POSITIVE', description: 'Soil composition' },
    ]);
    expect(Object.isFrozen(latest)).toBe(true);
    expect(helper.queries[0].options).toMatchObject({ scanIndexForward: false, limit: 1 });
  });
});

describe('DynamoRecommendationRepository', () => {
  it('skips the batch write for an empty list', async () => {
    const { helper, repositories } = setup();

    await repositories.recommendations.saveAll([]);

    expect(helper.batches).toEqual([]);
  });

  it('writes every recommendation without undefined attributes', async () => {
    const { helper, repositories } = setup();
    const recommendation: Recommendation = {
      id: 'rec-1',
      sessionId: 'session-1',
      recommendationDate: AS_OF,
      category: RecommendationCategory.MONITORING,
      priority: Priority.LOW,
      title: 'Regular Crop Monitoring',
      description: 'Scout weekly.',
      confidence: undefined,
      isViewed: false,
      isImplemented: false,
      createdAt: '2024-06-30T09:00:00.000Z',
    };

    await repositories.recommendations.saveAll([recommendation]);

    expect(helper.batches).toHaveLength(1);
    expect(helper.batches[0].tableName).toBe('YieldAdvisor-Recommendations');
    expect('confidence' in helper.batches[0].items[0]).toBe(false);
  });

  it('maps stored items', async () => {
    const { helper, repositories } = setup();
    helper.queryResult = [storedRecommendation()];

    const [recommendation] = await repositories.recommendations.findBySession('session-1');

    expect(recommendation).toEqual({
      id: 'rec-1',
      sessionId: 'session-1',
      recommendationDate: AS_OF,
      category: RecommendationCategory.IRRIGATION,
      title: 'Increase Irrigation - Drought Stress Detected',
      description: 'Irrigate.',
      priority: Priority.HIGH,
      confidence: undefined,
      isViewed: false,
      isImplemented: true,
      createdAt: '2024-06-30T09:00:00.000Z',
    });
  });

  it('rejects an unknown category', async () => {
    const { helper, repositories } = setup();
    helper.queryResult = [storedRecommendation({ category: 'WEATHER' })];

    await expect(repositories.recommendations.findBySession('session-1')).rejects.toThrow(
      'Malformed item in YieldAdvisor-Recommendations: unknown category or priority'
    );
  });
});

describe('other Dynamo repositories', () => {
  it('maps a variety and requires its numeric attributes', async () => {
    const { helper, repositories } = setup();
    helper.getResult = {
      id: 'variety-1',
      name: 'Test Hybrid 614',
      maturityDays: 120,
      optimalTempMin: 18,
      optimalTempMax: 30,
      droughtResistant: true,
    };

    expect(await repositories.maizeVarieties.findById('variety-1')).toEqual({
      id: 'variety-1',
      name: 'Test Hybrid 614',
      maturityDays: 120,
      optimalTempMin: 18,
      optimalTempMax: 30,
      droughtResistant: true,
      diseaseResistance: undefined,
      averageYield: undefined,
    });
    expect(helper.gets[0]).toEqual({ tableName: 'YieldAdvisor-MaizeVarieties', key: { id: 'variety-1' } });

    helper.getResult = { id: 'variety-2', name: 'Broken', optimalTempMin: 18, optimalTempMax: 30 };
    await expect(repositories.maizeVarieties.findById('variety-2')).rejects.toThrow(
      'Malformed item in YieldAdvisor-MaizeVarieties: maturityDays is not a number'
    );
  });

  it('queries yield history by variety prefix', async () => {
    const { helper, repositories } = setup();

    await repositories.yieldHistory.findByFarmAndVariety('farm-1', 'variety-1');

    expect(helper.queries[0].options.expressionAttributeValues).toEqual({ ':farmId': 'farm-1', ':prefix': 'variety-1#' });
  });

  it('queries sessions through the farm index', async () => {
    const { helper, repositories } = setup();

    await repositories.plantingSessions.findByFarm('farm-1');

    expect(helper.queries[0]).toMatchObject({ tableName: 'YieldAdvisor-PlantingSessions', options: { indexName: 'FarmIdIndex' } });
  });

  it('returns null for a missing item', async () => {
    const { repositories } = setup();

    expect(await repositories.farms.findById('farm-9')).toBeNull();
    expect(await repositories.soilSamples.findLatestByFarm('farm-9')).toBeNull();
  });
});
