/**
 * DynamoDB helper utilities for the yield advisor
 * Provides common document operations with error handling
 */

import { DynamoDB } from 'aws-sdk';
import { DocumentClient } from 'aws-sdk/clients/dynamodb';
import { errorMessage } from './errors';
import { Logger } from './logger';

export type DynamoItem = DocumentClient.AttributeMap;

export interface QueryOptions {
  keyConditionExpression: string;
  expressionAttributeValues: DocumentClient.ExpressionAttributeValueMap;
  expressionAttributeNames?: DocumentClient.ExpressionAttributeNameMap;
  filterExpression?: string;
  indexName?: string;
  limit?: number;
  scanIndexForward?: boolean;
}

function isConditionalCheckFailure(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ConditionalCheckFailedException';
}

export class DynamoDBHelper {
  private docClient: DocumentClient;
  private logger: Logger;

  constructor(logger: Logger, docClient?: DocumentClient) {
    this.logger = logger.child({ component: 'DynamoDBHelper' });
    this.docClient = docClient ?? new DynamoDB.DocumentClient({
      region: process.env.AWS_REGION || 'us-east-1',
    });
  }

  /**
   * Put an item into a DynamoDB table
   */
  async putItem(tableName: string, item: DynamoItem): Promise<void> {
    const params: DocumentClient.PutItemInput = {
      TableName: tableName,
      Item: {
        ...item,
        updatedAt: new Date().toISOString(),
      },
    };

    try {
      await this.docClient.put(params).promise();
    } catch (error) {
      this.logger.error(`Error putting item to ${tableName}`, error);
      throw new Error(`Failed to put item to ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Put an item only when no item with the same key exists.
   * Returns false when the item was already present.
   */
  async putItemIfAbsent(tableName: string, item: DynamoItem, partitionKeyName: string): Promise<boolean> {
    const params: DocumentClient.PutItemInput = {
      TableName: tableName,
      Item: {
        ...item,
        updatedAt: new Date().toISOString(),
      },
      ConditionExpression: 'attribute_not_exists(#pk)',
      ExpressionAttributeNames: { '#pk': partitionKeyName },
    };

    try {
      await this.docClient.put(params).promise();
      return true;
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        this.logger.debug('Conditional put skipped, item already exists', { tableName });
        return false;
      }
      this.logger.error(`Error putting item to ${tableName}`, error);
      throw new Error(`Failed to put item to ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Get an item from a DynamoDB table
   */
  async getItem(tableName: string, key: DocumentClient.Key): Promise<DynamoItem | null> {
    const params: DocumentClient.GetItemInput = {
      TableName: tableName,
      Key: key,
    };

    try {
      const result = await this.docClient.get(params).promise();
      return result.Item || null;
    } catch (error) {
      this.logger.error(`Error getting item from ${tableName}`, error);
      throw new Error(`Failed to get item from ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Query items from a DynamoDB table, following pagination unless a limit is set
   */
  async queryItems(tableName: string, options: QueryOptions): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: DocumentClient.Key | undefined;

    try {
      do {
        const params: DocumentClient.QueryInput = {
          TableName: tableName,
          KeyConditionExpression: options.keyConditionExpression,
          ExpressionAttributeValues: options.expressionAttributeValues,
          ExpressionAttributeNames: options.expressionAttributeNames,
          FilterExpression: options.filterExpression,
          IndexName: options.indexName,
          Limit: options.limit,
          ScanIndexForward: options.scanIndexForward,
          ExclusiveStartKey: exclusiveStartKey,
        };

        const result = await this.docClient.query(params).promise();
        items.push(...(result.Items || []));
        exclusiveStartKey = options.limit === undefined ? result.LastEvaluatedKey : undefined;
      } while (exclusiveStartKey);

      return items;
    } catch (error) {
      this.logger.error(`Error querying items from ${tableName}`, error);
      throw new Error(`Failed to query items from ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Scan items from a DynamoDB table (use sparingly)
   */
  async scanItems(tableName: string, filterExpression?: string, expressionAttributeValues?: DocumentClient.ExpressionAttributeValueMap): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: DocumentClient.Key | undefined;

    try {
      do {
        const params: DocumentClient.ScanInput = {
          TableName: tableName,
          FilterExpression: filterExpression,
          ExpressionAttributeValues: expressionAttributeValues,
          ExclusiveStartKey: exclusiveStartKey,
        };

        const result = await this.docClient.scan(params).promise();
        items.push(...(result.Items || []));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return items;
    } catch (error) {
      this.logger.error(`Error scanning items from ${tableName}`, error);
      throw new Error(`Failed to scan items from ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Batch write items to DynamoDB
   */
  async batchWriteItems(tableName: string, items: DynamoItem[]): Promise<void> {
    const batchSize = 25; // DynamoDB batch write limit
    const timestamp = new Date().toISOString();

    for (let i = 0; i < items.length; i += batchSize) {
      const batch = items.slice(i, i + batchSize);
      const params: DocumentClient.BatchWriteItemInput = {
        RequestItems: {
          [tableName]: batch.map(item => ({
            PutRequest: {
              Item: {
                ...item,
                updatedAt: timestamp,
              },
            },
          })),
        },
      };

      try {
        await this.docClient.batchWrite(params).promise();
      } catch (error) {
        this.logger.error(`Error batch writing items to ${tableName}`, error);
        throw new Error(`Failed to batch write items to ${tableName}: ${errorMessage(error)}`, { cause: error });
      }
    }
  }

  /**
   * Generate TTL timestamp for DynamoDB items
   */
  generateTTL(daysFromNow: number): number {
    const ttlDate = new Date(Date.now() + daysFromNow * 24 * 60 * 60 * 1000);
    return Math.floor(ttlDate.getTime() / 1000);
  }
}
