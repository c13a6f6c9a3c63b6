import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  type GetCommandInput,
  type PutCommandInput,
  type QueryCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { config } from './config.js';

// Create DynamoDB client
const client = new DynamoDBClient({ region: config.region });

// Create document client with marshalling options
export const docClient = DynamoDBDocumentClient.from(client, {
  marshallOptions: {
    removeUndefinedValues: true,
    convertEmptyValues: false,
  },
  unmarshallOptions: {
    wrapNumbers: false,
  },
});

// Helper functions for common operations
export async function getItem<T>(params: GetCommandInput): Promise<T | null> {
  const result = await docClient.send(new GetCommand(params));
  return (result.Item as T) || null;
}

export async function putItem(params: PutCommandInput): Promise<void> {
  await docClient.send(new PutCommand(params));
}

export async function queryItems<T>(
  params: QueryCommandInput
): Promise<{ items: T[]; lastEvaluatedKey?: Record<string, unknown> }> {
  const result = await docClient.send(new QueryCommand(params));
  return {
    items: (result.Items as T[]) || [],
    lastEvaluatedKey: result.LastEvaluatedKey as Record<string, unknown> | undefined,
  };
}

// A failed ConditionExpression surfaces as a named SDK exception
export function isConditionalCheckFailure(error: unknown): boolean {
  return (
    !!error &&
    typeof error === 'object' &&
    'name' in error &&
    error.name === 'ConditionalCheckFailedException'
  );
}

// DynamoDB key attributes that get added to items
type DynamoKeys = 'PK' | 'SK' | 'GSI1PK' | 'GSI1SK';
const DYNAMO_KEYS: DynamoKeys[] = ['PK', 'SK', 'GSI1PK', 'GSI1SK'];

// Strip DynamoDB key attributes from an item
export function stripKeys<T extends { PK: string; SK: string }>(
  item: T
): Omit<T, DynamoKeys> {
  const result = { ...item };
  for (const key of DYNAMO_KEYS) {
    delete (result as Record<string, unknown>)[key];
  }
  return result as Omit<T, DynamoKeys>;
}
