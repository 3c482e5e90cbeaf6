import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';

import { type MetadataRecord, toItem } from '../models/metadata.js';

export interface RecordStore {
  upsert(table: string, record: MetadataRecord): Promise<void>;
}

// PutItem replaces any item with the same ImageName, which is the upsert we want
export const createRecordStore = (
  client: DynamoDBDocumentClient = DynamoDBDocumentClient.from(new DynamoDBClient({})),
): RecordStore => ({
  upsert: async (table, record) => {
    console.debug(`PUT ${table}:${record.imageName}`);
    await client.send(
      new PutCommand({
        TableName: table,
        Item: toItem(record),
      }),
    );
  },
});
