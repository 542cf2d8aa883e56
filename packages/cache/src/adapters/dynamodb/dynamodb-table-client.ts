import {
  type BatchWriteItemCommandInput,
  type BatchWriteItemCommandOutput,
  BatchWriteItemCommand,
  type DeleteItemCommandInput,
  type DeleteItemCommandOutput,
  DeleteItemCommand,
  DynamoDBClient,
  type GetItemCommandInput,
  type GetItemCommandOutput,
  GetItemCommand,
  type PutItemCommandInput,
  PutItemCommand,
  type ScanCommandInput,
  type ScanCommandOutput,
  ScanCommand,
} from "@aws-sdk/client-dynamodb"

/** The DynamoDB operations the backend issues, one method per command. */
export type DynamoDbTableClient = {
  getItem(input: GetItemCommandInput): Promise<Pick<GetItemCommandOutput, "Item">>
  putItem(input: PutItemCommandInput): Promise<unknown>
  deleteItem(input: DeleteItemCommandInput): Promise<Pick<DeleteItemCommandOutput, "Attributes">>
  scan(input: ScanCommandInput): Promise<Pick<ScanCommandOutput, "Items" | "LastEvaluatedKey">>
  batchWriteItem(
    input: BatchWriteItemCommandInput,
  ): Promise<Pick<BatchWriteItemCommandOutput, "UnprocessedItems">>
  destroy(): void
}

export type DynamoDbClientOptions = {
  region?: string | undefined
  /** Local endpoint such as DynamoDB Local. */
  endpoint?: string | undefined
}

export function createDynamoDbTableClient(client: DynamoDBClient): DynamoDbTableClient {
  return {
    getItem: (input) => client.send(new GetItemCommand(input)),
    putItem: (input) => client.send(new PutItemCommand(input)),
    deleteItem: (input) => client.send(new DeleteItemCommand(input)),
    scan: (input) => client.send(new ScanCommand(input)),
    batchWriteItem: (input) => client.send(new BatchWriteItemCommand(input)),
    destroy: () => client.destroy(),
  }
}

export function createDynamoDbClient(options: DynamoDbClientOptions = {}): DynamoDbTableClient {
  const client = new DynamoDBClient({
    ...(options.region ? { region: options.region } : {}),
    ...(options.endpoint ? { endpoint: options.endpoint } : {}),
  })

  return createDynamoDbTableClient(client)
}
