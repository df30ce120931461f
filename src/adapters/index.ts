// Transport adapters for region failover

export { BedrockTransport, createSdkClient } from "./bedrock";

export type {
  BedrockMessagesInput,
  BedrockRawBodyInput,
  BedrockRegionClient,
  BedrockTransportOptions,
  ClientLifetime,
  ResolvedClientOptions,
} from "./bedrock";
