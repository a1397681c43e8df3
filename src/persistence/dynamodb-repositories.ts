/**
 * DynamoDB implementations of the repository contracts
 *
 * Key layout:
 *   Farms, MaizeVarieties, PlantingSessions   id                       (sessions: FarmIdIndex on farmId)
 *   WeatherObservations                      farmId + date            (expires after the retention period)
 *   SoilSamples                              farmId + sampleDate
 *   YieldHistory                             farmId + varietySeason   ("{varietyId}#{season}")
 *   YieldPredictions                         sessionId + predictionKey ("{predictionDate}#{createdAt}#{id}")
 *   Recommendations                          sessionId + id
 */

import type { Farm, IsoDate } from '../types/core';
import type { WeatherObservation, WeatherSource } from '../types/weather';
import type { MaizeVariety, PlantingSession, SoilSample, YieldHistoryRecord } from '../types/agronomy';
import type { FactorImportance, PredictionFeature, YieldPrediction } from '../types/prediction';
import type { Recommendation } from '../types/recommendation';
import type { EnvironmentConfig } from '../shared/config/environment';
import { TABLE_INDEXES } from '../shared/config/constants';
import { DynamoDBHelper, DynamoItem } from '../shared/utils/dynamodb-helper';
import { Logger } from '../shared/utils/logger';
import { isPriority, isRecommendationCategory } from '../shared/utils/validation';
import type {
  FarmRepository,
  MaizeVarietyRepository,
  PlantingSessionRepository,
  RecommendationRepository,
  Repositories,
  SoilSampleRepository,
  WeatherObservationRepository,
  YieldHistoryRepository,
  YieldPredictionRepository,
} from './repositories';

const WEATHER_SOURCES: readonly WeatherSource[] = ['WeatherAPI', 'OpenWeatherMap', 'WeatherStack'];
const PREDICTION_FEATURES: readonly PredictionFeature[] = [
  'PlantingDate',
  'DaysSincePlanting',
  'MaizeVariety',
  'SoilData',
  'WeatherData',
];
const KEY_SEPARATOR = '#';
const KEY_UPPER_BOUND = '\uffff';

/**
 * Typed access to untyped DynamoDB attributes
 */
class ItemReader {
  constructor(
    private readonly item: DynamoItem,
    private readonly table: string
  ) {}

  string(name: string): string {
    const value = this.item[name];
    if (typeof value !== 'string') {
      throw new Error(`Malformed item in ${this.table}: ${name} is not a string`);
    }
    return value;
  }

  number(name: string): number {
    const value = this.item[name];
    if (typeof value !== 'number') {
      throw new Error(`Malformed item in ${this.table}: ${name} is not a number`);
    }
    return value;
  }

  boolean(name: string): boolean {
    return this.item[name] === true;
  }

  optionalString(name: string): string | undefined {
    const value = this.item[name];
    return typeof value === 'string' ? value : undefined;
  }

  optionalNumber(name: string): number | undefined {
    const value = this.item[name];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  }

  list(name: string): unknown[] {
    const value = this.item[name];
    return Array.isArray(value) ? value : [];
  }
}

function isWeatherSource(value: unknown): value is WeatherSource {
  return WEATHER_SOURCES.some(source => source === value);
}

function isPredictionFeature(value: unknown): value is PredictionFeature {
  return PREDICTION_FEATURES.some(feature => feature === value);
}

function readFactor(value: unknown): FactorImportance | null {
  if (typeof value !== 'object' || value === null) return null;
  const reader = new ItemReader(Object.fromEntries(Object.entries(value)), 'factors');
  const effect = reader.optionalString('effect');
  if (effect !== 'POSITIVE' && effect !== 'NEGATIVE' && effect !== 'NEUTRAL') return null;

  return {
    factor: reader.string('factor'),
    importance: reader.number('importance'),
    effect,
    description: reader.optionalString('description') ?? '',
  };
}

/**
 * DynamoDB rejects undefined attribute values
 */
function withoutUndefined(item: DynamoItem): DynamoItem {
  return Object.fromEntries(Object.entries(item).filter(([, value]) => value !== undefined));
}

export class DynamoFarmRepository implements FarmRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async findById(farmId: string): Promise<Farm | null> {
    const item = await this.db.getItem(this.table, { id: farmId });
    return item ? this.toFarm(item) : null;
  }

  async listFarms(): Promise<Farm[]> {
    const items = await this.db.scanItems(this.table);
    return items.map(item => this.toFarm(item));
  }

  private toFarm(item: DynamoItem): Farm {
    const read = new ItemReader(item, this.table);
    return {
      id: read.string('id'),
      name: read.string('name'),
      ownerId: read.string('ownerId'),
      latitude: read.optionalNumber('latitude'),
      longitude: read.optionalNumber('longitude'),
    };
  }
}

export class DynamoWeatherObservationRepository implements WeatherObservationRepository {
  constructor(
    private readonly db: DynamoDBHelper,
    private readonly table: string,
    private readonly retentionDays: number
  ) {}

  async findByFarmAndDate(farmId: string, date: IsoDate): Promise<WeatherObservation | null> {
    const item = await this.db.getItem(this.table, { farmId, date });
    return item ? this.toObservation(item) : null;
  }

  async findByFarmAndDateRange(farmId: string, start: IsoDate, end: IsoDate): Promise<WeatherObservation[]> {
    const items = await this.db.queryItems(this.table, {
      keyConditionExpression: 'farmId = :farmId AND #date BETWEEN :start AND :end',
      expressionAttributeNames: { '#date': 'date' },
      expressionAttributeValues: { ':farmId': farmId, ':start': start, ':end': end },
      scanIndexForward: true,
    });
    return items.map(item => this.toObservation(item));
  }

  upsert(observation: WeatherObservation): Promise<boolean> {
    return this.db.putItemIfAbsent(
      this.table,
      withoutUndefined({ ...observation, ttl: this.db.generateTTL(this.retentionDays) }),
      'farmId'
    );
  }

  private toObservation(item: DynamoItem): WeatherObservation {
    const read = new ItemReader(item, this.table);
    const source = read.string('source');
    if (!isWeatherSource(source)) {
      throw new Error(`Malformed item in ${this.table}: unknown source ${source}`);
    }

    return {
      farmId: read.string('farmId'),
      date: read.string('date'),
      minTemperature: read.optionalNumber('minTemperature'),
      maxTemperature: read.optionalNumber('maxTemperature'),
      avgTemperature: read.optionalNumber('avgTemperature'),
      rainfallMm: read.optionalNumber('rainfallMm'),
      humidity: read.optionalNumber('humidity'),
      windSpeedKmh: read.optionalNumber('windSpeedKmh'),
      solarRadiation: read.optionalNumber('solarRadiation'),
      source,
    };
  }
}

export class DynamoSoilSampleRepository implements SoilSampleRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async findLatestByFarm(farmId: string): Promise<SoilSample | null> {
    const [item] = await this.db.queryItems(this.table, {
      keyConditionExpression: 'farmId = :farmId',
      expressionAttributeValues: { ':farmId': farmId },
      scanIndexForward: false,
      limit: 1,
    });
    if (!item) {
      return null;
    }

    const read = new ItemReader(item, this.table);
    return {
      id: read.string('id'),
      farmId: read.string('farmId'),
      sampleDate: read.string('sampleDate'),
      soilType: read.optionalString('soilType'),
      ph: read.optionalNumber('ph'),
      organicMatter: read.optionalNumber('organicMatter'),
      nitrogen: read.optionalNumber('nitrogen'),
      phosphorus: read.optionalNumber('phosphorus'),
      potassium: read.optionalNumber('potassium'),
      moisture: read.optionalNumber('moisture'),
    };
  }
}

export class DynamoPlantingSessionRepository implements PlantingSessionRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async findById(sessionId: string): Promise<PlantingSession | null> {
    const item = await this.db.getItem(this.table, { id: sessionId });
    return item ? this.toSession(item) : null;
  }

  async findByFarm(farmId: string): Promise<PlantingSession[]> {
    const items = await this.db.queryItems(this.table, {
      indexName: TABLE_INDEXES.SESSIONS_BY_FARM,
      keyConditionExpression: 'farmId = :farmId',
      expressionAttributeValues: { ':farmId': farmId },
    });
    return items.map(item => this.toSession(item));
  }

  private toSession(item: DynamoItem): PlantingSession {
    const read = new ItemReader(item, this.table);
    return {
      id: read.string('id'),
      farmId: read.string('farmId'),
      varietyId: read.string('varietyId'),
      plantingDate: read.string('plantingDate'),
      expectedHarvestDate: read.optionalString('expectedHarvestDate'),
      userId: read.optionalString('userId'),
    };
  }
}

export class DynamoMaizeVarietyRepository implements MaizeVarietyRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async findById(varietyId: string): Promise<MaizeVariety | null> {
    const item = await this.db.getItem(this.table, { id: varietyId });
    if (!item) {
      return null;
    }

    const read = new ItemReader(item, this.table);
    return {
      id: read.string('id'),
      name: read.string('name'),
      maturityDays: read.number('maturityDays'),
      optimalTempMin: read.number('optimalTempMin'),
      optimalTempMax: read.number('optimalTempMax'),
      droughtResistant: read.boolean('droughtResistant'),
      diseaseResistance: read.optionalString('diseaseResistance'),
      averageYield: read.optionalNumber('averageYield'),
    };
  }
}

export class DynamoYieldHistoryRepository implements YieldHistoryRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async findByFarmAndVariety(farmId: string, varietyId: string): Promise<YieldHistoryRecord[]> {
    const items = await this.db.queryItems(this.table, {
      keyConditionExpression: 'farmId = :farmId AND begins_with(varietySeason, :prefix)',
      expressionAttributeValues: { ':farmId': farmId, ':prefix': `${varietyId}${KEY_SEPARATOR}` },
    });

    return items.map(item => {
      const read = new ItemReader(item, this.table);
      return {
        farmId: read.string('farmId'),
        varietyId: read.string('varietyId'),
        season: read.string('season'),
        actualYield: read.number('actualYield'),
      };
    });
  }
}

export class DynamoYieldPredictionRepository implements YieldPredictionRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async save(prediction: YieldPrediction): Promise<void> {
    await this.db.putItem(this.table, {
      ...prediction,
      featuresUsed: [...prediction.featuresUsed],
      factors: prediction.factors.map(factor => ({ ...factor })),
      predictionKey: [prediction.predictionDate, prediction.createdAt, prediction.id].join(KEY_SEPARATOR),
    });
  }

  async findBySession(sessionId: string, from?: IsoDate, to?: IsoDate): Promise<YieldPrediction[]> {
    const items = await this.db.queryItems(this.table, {
      keyConditionExpression: 'sessionId = :sessionId AND predictionKey BETWEEN :from AND :to',
      expressionAttributeValues: {
        ':sessionId': sessionId,
        ':from': from ?? '0000-00-00',
        ':to': `${to ?? '9999-12-31'}${KEY_SEPARATOR}${KEY_UPPER_BOUND}`,
      },
      scanIndexForward: true,
    });
    return items.map(item => this.toPrediction(item));
  }

  async findLatestBySession(sessionId: string): Promise<YieldPrediction | null> {
    const [item] = await this.db.queryItems(this.table, {
      keyConditionExpression: 'sessionId = :sessionId',
      expressionAttributeValues: { ':sessionId': sessionId },
      scanIndexForward: false,
      limit: 1,
    });
    return item ? this.toPrediction(item) : null;
  }

  private toPrediction(item: DynamoItem): YieldPrediction {
    const read = new ItemReader(item, this.table);
    return Object.freeze({
      id: read.string('id'),
      sessionId: read.string('sessionId'),
      predictionDate: read.string('predictionDate'),
      predictedYield: read.number('predictedYield'),
      confidence: read.number('confidence'),
      modelVersion: read.string('modelVersion'),
      featuresUsed: Object.freeze(read.list('featuresUsed').filter(isPredictionFeature)),
      factors: Object.freeze(
        read.list('factors')
          .map(readFactor)
          .filter((factor): factor is FactorImportance => factor !== null)
      ),
      createdAt: read.string('createdAt'),
    });
  }
}

export class DynamoRecommendationRepository implements RecommendationRepository {
  constructor(private readonly db: DynamoDBHelper, private readonly table: string) {}

  async saveAll(recommendations: Recommendation[]): Promise<void> {
    if (recommendations.length === 0) {
      return;
    }
    await this.db.batchWriteItems(this.table, recommendations.map(item => withoutUndefined({ ...item })));
  }

  async findBySession(sessionId: string): Promise<Recommendation[]> {
    const items = await this.db.queryItems(this.table, {
      keyConditionExpression: 'sessionId = :sessionId',
      expressionAttributeValues: { ':sessionId': sessionId },
    });

    return items.map(item => {
      const read = new ItemReader(item, this.table);
      const category = read.string('category');
      const priority = read.string('priority');
      if (!isRecommendationCategory(category) || !isPriority(priority)) {
        throw new Error(`Malformed item in ${this.table}: unknown category or priority`);
      }

      return {
        id: read.string('id'),
        sessionId: read.string('sessionId'),
        recommendationDate: read.string('recommendationDate'),
        category,
        title: read.string('title'),
        description: read.string('description'),
        priority,
        confidence: read.optionalNumber('confidence'),
        isViewed: read.boolean('isViewed'),
        isImplemented: read.boolean('isImplemented'),
        createdAt: read.string('createdAt'),
      };
    });
  }
}

export function createDynamoRepositories(config: EnvironmentConfig, logger: Logger, db?: DynamoDBHelper): Repositories {
  const helper = db ?? new DynamoDBHelper(logger);
  const { tables } = config;

  return {
    farms: new DynamoFarmRepository(helper, tables.farms),
    weatherObservations: new DynamoWeatherObservationRepository(helper, tables.weatherObservations, config.weatherRetentionDays),
    soilSamples: new DynamoSoilSampleRepository(helper, tables.soilSamples),
    plantingSessions: new DynamoPlantingSessionRepository(helper, tables.plantingSessions),
    maizeVarieties: new DynamoMaizeVarietyRepository(helper, tables.maizeVarieties),
    yieldHistory: new DynamoYieldHistoryRepository(helper, tables.yieldHistory),
    yieldPredictions: new DynamoYieldPredictionRepository(helper, tables.yieldPredictions),
    recommendations: new DynamoRecommendationRepository(helper, tables.recommendations),
  };
}
