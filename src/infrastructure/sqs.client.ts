import { SQSClient } from '@aws-sdk/client-sqs';
import { NodeHttpHandler } from '@smithy/node-http-handler';

const CONNECTION_TIMEOUT_MS = 3_000;

// Long polls hold the connection for up to 20s, so the request timeout has to outlast them.
const REQUEST_TIMEOUT_MS = 30_000;

export function createSqsClient(): SQSClient {
  return new SQSClient({
    requestHandler: new NodeHttpHandler({
      connectionTimeout: CONNECTION_TIMEOUT_MS,
      requestTimeout: REQUEST_TIMEOUT_MS,
    }),
  });
}
