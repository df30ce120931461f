// Bedrock Runtime transport for region failover
//
// Uses `@aws-sdk/client-bedrock-runtime`. One regional client serves each
// invocation; SDK-level retries are off so every retry goes through the
// failover budget instead.

import {
  BedrockRuntimeClient,
  ConverseCommand,
  ConverseStreamCommand,
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
} from "@aws-sdk/client-bedrock-runtime";
import type {
  BedrockRuntimeClientConfig,
  ConverseCommandInput,
  ConverseStreamCommandInput,
  InvokeModelCommandInput,
  InvokeModelWithResponseStreamCommandInput,
} from "@aws-sdk/client-bedrock-runtime";
import type {
  FailoverTransport,
  InvocationOptions,
  InvocationTarget,
} from "../types/transport";

/**
 * Messages-shape input, without the model id the failover layer fills in
 */
export type BedrockMessagesInput = Omit<ConverseCommandInput, "modelId"> &
  Omit<ConverseStreamCommandInput, "modelId">;

/**
 * Raw-body input, without the model id the failover layer fills in
 */
export type BedrockRawBodyInput = Omit<InvokeModelCommandInput, "modelId"> &
  Omit<InvokeModelWithResponseStreamCommandInput, "modelId">;

/**
 * The four operations used from a regional Bedrock Runtime client.
 * Responses are passed through untouched to the call shapes.
 */
export interface BedrockRegionClient {
  converse(input: ConverseCommandInput): Promise<unknown>;
  converseStream(input: ConverseStreamCommandInput): Promise<unknown>;
  invokeModel(input: InvokeModelCommandInput): Promise<unknown>;
  invokeModelWithResponseStream(
    input: InvokeModelWithResponseStreamCommandInput,
  ): Promise<unknown>;
  destroy(): void;
}

export type ClientLifetime = "pooled" | "per_call";

export interface BedrockTransportOptions {
  /**
   * `"pooled"` keeps one client per region until `destroy()`;
   * `"per_call"` builds a new client for every invocation
   * @default "pooled"
   */
  clientLifetime?: ClientLifetime;

  /**
   * Connection timeout in milliseconds
   * @default 5000
   */
  connectTimeoutMs?: number;

  /**
   * Socket read timeout in milliseconds
   * @default 5000
   */
  readTimeoutMs?: number;

  /**
   * Extra client configuration (credentials, endpoint, logger...).
   * `region`, `maxAttempts` and `requestHandler` are set by the transport.
   */
  clientConfig?: Omit<
    BedrockRuntimeClientConfig,
    "region" | "maxAttempts" | "requestHandler"
  >;

  /**
   * Build the client for a region. Replaces the SDK client, e.g. in tests.
   */
  createClient?: (
    region: string,
    options: ResolvedClientOptions,
  ) => BedrockRegionClient;
}

export interface ResolvedClientOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  clientConfig?: BedrockTransportOptions["clientConfig"];
}

/**
 * Regional client backed by `BedrockRuntimeClient`
 */
export function createSdkClient(
  region: string,
  options: ResolvedClientOptions,
): BedrockRegionClient {
  const client = new BedrockRuntimeClient({
    ...options.clientConfig,
    region,
    maxAttempts: 1,
    requestHandler: {
      connectionTimeout: options.connectTimeoutMs,
      requestTimeout: options.readTimeoutMs,
    },
  });

  return {
    converse: (input) => client.send(new ConverseCommand(input)),
    converseStream: (input) => client.send(new ConverseStreamCommand(input)),
    invokeModel: (input) => client.send(new InvokeModelCommand(input)),
    invokeModelWithResponseStream: (input) =>
      client.send(new InvokeModelWithResponseStreamCommand(input)),
    destroy: () => client.destroy(),
  };
}

/**
 * Failover transport over Amazon Bedrock Runtime.
 *
 * @example
 * ```typescript
 * const transport = new BedrockTransport({ readTimeoutMs: 30000 });
 * const failover = await createRegionFailover({
 *   transport,
 *   modelId: "anthropic.claude-3-haiku-20240307-v1:0",
 *   configPath: "./endpoints.json",
 * });
 * // ...
 * transport.destroy();
 * ```
 */
export class BedrockTransport
  implements FailoverTransport<BedrockMessagesInput, BedrockRawBodyInput>
{
  private readonly lifetime: ClientLifetime;
  private readonly clientOptions: ResolvedClientOptions;
  private readonly createClient: (
    region: string,
    options: ResolvedClientOptions,
  ) => BedrockRegionClient;
  private readonly clients = new Map<string, BedrockRegionClient>();

  constructor(options: BedrockTransportOptions = {}) {
    this.lifetime = options.clientLifetime ?? "pooled";
    this.clientOptions = {
      connectTimeoutMs: options.connectTimeoutMs ?? 5000,
      readTimeoutMs: options.readTimeoutMs ?? 5000,
      clientConfig: options.clientConfig,
    };
    this.createClient = options.createClient ?? createSdkClient;
  }

  converse(
    target: InvocationTarget,
    input: BedrockMessagesInput,
    options: InvocationOptions,
  ): Promise<unknown> {
    const request = { ...input, modelId: target.modelId };
    return this.withClient(target.region, options.stream, (client) =>
      options.stream
        ? client.converseStream(request)
        : client.converse(request),
    );
  }

  invokeModel(
    target: InvocationTarget,
    input: BedrockRawBodyInput,
    options: InvocationOptions,
  ): Promise<unknown> {
    const request = { ...input, modelId: target.modelId };
    return this.withClient(target.region, options.stream, (client) =>
      options.stream
        ? client.invokeModelWithResponseStream(request)
        : client.invokeModel(request),
    );
  }

  /**
   * Number of pooled regional clients
   */
  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Close every pooled client
   */
  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }

  private async withClient<T>(
    region: string,
    stream: boolean,
    call: (client: BedrockRegionClient) => Promise<T>,
  ): Promise<T> {
    if (this.lifetime === "pooled") {
      return call(this.pooledClient(region));
    }

    const client = this.createClient(region, this.clientOptions);
    if (stream) {
      // The response stream still reads through this client
      return call(client);
    }
    try {
      return await call(client);
    } finally {
      client.destroy();
    }
  }

  private pooledClient(region: string): BedrockRegionClient {
    let client = this.clients.get(region);
    if (!client) {
      client = this.createClient(region, this.clientOptions);
      this.clients.set(region, client);
    }
    return client;
  }
}
