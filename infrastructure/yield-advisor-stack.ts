import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import { EVENT_DETAIL_TYPES, EVENT_SOURCES, TABLE_INDEXES, TABLE_NAMES } from '../src/shared/config/constants';

export interface YieldAdvisorStackProps extends cdk.StackProps {
  stage: string;
}

// Forwarded from the deploying shell when set
const PASSTHROUGH_VARIABLES = [
  'WEATHERAPI_KEY',
  'OPENWEATHER_API_KEY',
  'WEATHERSTACK_API_KEY',
  'ADVANCED_RECOMMENDATIONS_MODE',
  'ADVANCED_RECOMMENDATIONS_URL',
  'ADVANCED_RECOMMENDATIONS_API_KEY',
];

export class YieldAdvisorStack extends cdk.Stack {
  public readonly tables: Record<keyof typeof TABLE_NAMES, dynamodb.Table>;
  public readonly eventBus: events.EventBus;
  public readonly weatherCollectionFunction: lambda.Function;
  public readonly recommendationTriggerFunction: lambda.Function;

  constructor(scope: Construct, id: string, props: YieldAdvisorStackProps) {
    super(scope, id, props);

    this.tables = this.createTables();

    this.eventBus = new events.EventBus(this, 'YieldAdvisorEventBus', {
      eventBusName: 'YieldAdvisor-Events',
    });

    const environment = this.functionEnvironment(props.stage);

    this.weatherCollectionFunction = new lambda.Function(this, 'WeatherCollectionFunction', {
      functionName: 'YieldAdvisor-WeatherCollection',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'src/weather-acquisition/weather-collection.handler',
      code: lambda.Code.fromAsset('dist'),
      timeout: cdk.Duration.minutes(10),
      memorySize: 512,
      environment,
      logRetention: logs.RetentionDays.ONE_MONTH,
    });

    this.recommendationTriggerFunction = new lambda.Function(this, 'RecommendationTriggerFunction', {
      functionName: 'YieldAdvisor-RecommendationTrigger',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'src/advisory-engine/recommendation-trigger.handler',
      code: lambda.Code.fromAsset('dist'),
      timeout: cdk.Duration.minutes(2),
      memorySize: 256,
      environment,
      logRetention: logs.RetentionDays.ONE_MONTH,
    });

    this.grantAccess();
    this.createRules();
    this.createOutputs();
  }

  private createTables(): Record<keyof typeof TABLE_NAMES, dynamodb.Table> {
    const table = (
      id: string,
      tableName: string,
      partitionKey: string,
      sortKey?: string,
      timeToLiveAttribute?: string
    ): dynamodb.Table =>
      new dynamodb.Table(this, id, {
        tableName,
        partitionKey: { name: partitionKey, type: dynamodb.AttributeType.STRING },
        sortKey: sortKey ? { name: sortKey, type: dynamodb.AttributeType.STRING } : undefined,
        billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
        encryption: dynamodb.TableEncryption.AWS_MANAGED,
        pointInTimeRecovery: true,
        removalPolicy: cdk.RemovalPolicy.RETAIN,
        timeToLiveAttribute,
      });

    const plantingSessions = table('PlantingSessionsTable', TABLE_NAMES.PLANTING_SESSIONS, 'id');
    plantingSessions.addGlobalSecondaryIndex({
      indexName: TABLE_INDEXES.SESSIONS_BY_FARM,
      partitionKey: { name: 'farmId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'plantingDate', type: dynamodb.AttributeType.STRING },
    });

    return {
      FARMS: table('FarmsTable', TABLE_NAMES.FARMS, 'id'),
      WEATHER_OBSERVATIONS: table('WeatherObservationsTable', TABLE_NAMES.WEATHER_OBSERVATIONS, 'farmId', 'date', 'ttl'),
      SOIL_SAMPLES: table('SoilSamplesTable', TABLE_NAMES.SOIL_SAMPLES, 'farmId', 'sampleDate'),
      PLANTING_SESSIONS: plantingSessions,
      MAIZE_VARIETIES: table('MaizeVarietiesTable', TABLE_NAMES.MAIZE_VARIETIES, 'id'),
      YIELD_HISTORY: table('YieldHistoryTable', TABLE_NAMES.YIELD_HISTORY, 'farmId', 'varietySeason'),
      YIELD_PREDICTIONS: table('YieldPredictionsTable', TABLE_NAMES.YIELD_PREDICTIONS, 'sessionId', 'predictionKey'),
      RECOMMENDATIONS: table('RecommendationsTable', TABLE_NAMES.RECOMMENDATIONS, 'sessionId', 'id'),
    };
  }

  private functionEnvironment(stage: string): Record<string, string> {
    const environment: Record<string, string> = {
      STAGE: stage,
      LOG_LEVEL: 'INFO',
      EVENT_BUS_NAME: this.eventBus.eventBusName,
      NODE_OPTIONS: '--enable-source-maps',
    };

    for (const name of PASSTHROUGH_VARIABLES) {
      const value = process.env[name];
      if (value) {
        environment[name] = value;
      }
    }
    return environment;
  }

  private grantAccess(): void {
    const { tables } = this;

    tables.FARMS.grantReadData(this.weatherCollectionFunction);
    tables.WEATHER_OBSERVATIONS.grantReadWriteData(this.weatherCollectionFunction);
    this.eventBus.grantPutEventsTo(this.weatherCollectionFunction);

    for (const readOnly of [tables.WEATHER_OBSERVATIONS, tables.SOIL_SAMPLES, tables.PLANTING_SESSIONS, tables.MAIZE_VARIETIES, tables.YIELD_HISTORY, tables.YIELD_PREDICTIONS]) {
      readOnly.grantReadData(this.recommendationTriggerFunction);
    }
    tables.RECOMMENDATIONS.grantReadWriteData(this.recommendationTriggerFunction);
  }

  private createRules(): void {
    // Daily collection shortly after midnight UTC
    const collectionSchedule = new events.Rule(this, 'WeatherCollectionSchedule', {
      ruleName: 'YieldAdvisor-WeatherCollection-Schedule',
      description: 'Collects daily weather and backfills missing history',
      schedule: events.Schedule.cron({ minute: '15', hour: '0' }),
    });
    collectionSchedule.addTarget(new targets.LambdaFunction(this.weatherCollectionFunction));

    const predictionCompleted = new events.Rule(this, 'PredictionCompletedRule', {
      ruleName: 'YieldAdvisor-PredictionCompleted',
      description: 'Generates recommendations for every completed yield prediction',
      eventBus: this.eventBus,
      eventPattern: {
        source: [EVENT_SOURCES.PREDICTION],
        detailType: [EVENT_DETAIL_TYPES.PREDICTION_COMPLETED],
      },
    });
    predictionCompleted.addTarget(
      new targets.LambdaFunction(this.recommendationTriggerFunction, { retryAttempts: 2 })
    );
  }

  private createOutputs(): void {
    new cdk.CfnOutput(this, 'EventBusName', {
      value: this.eventBus.eventBusName,
      description: 'Event bus carrying prediction and provider events',
      exportName: 'YieldAdvisor-EventBusName',
    });

    new cdk.CfnOutput(this, 'WeatherObservationsTableName', {
      value: this.tables.WEATHER_OBSERVATIONS.tableName,
      description: 'Daily weather observations per farm',
      exportName: 'YieldAdvisor-WeatherObservationsTableName',
    });

    new cdk.CfnOutput(this, 'RecommendationsTableName', {
      value: this.tables.RECOMMENDATIONS.tableName,
      description: 'Generated recommendations per planting session',
      exportName: 'YieldAdvisor-RecommendationsTableName',
    });
  }
}
