import { GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
} from '../utils/dynamodb-client';
import { SettingsStore, DynamoDBSettingItem } from '../types';

/**
 * Plain key/value settings, last write wins
 */
export class SettingsRepository implements SettingsStore {
  constructor(private readonly tableName: string = getTableName('SETTINGS_TABLE_NAME')) {}

  async get(key: string): Promise<string | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: key },
        })
      );

      const value: unknown = response.Item?.value;
      return typeof value === 'string' ? value : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async set(key: string, value: string): Promise<void> {
    const item: DynamoDBSettingItem = {
      PK: key,
      value,
      updatedAt: getCurrentTimestamp(),
    };

    try {
      await withRetry(() =>
        dynamoClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: item,
          })
        )
      );
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
