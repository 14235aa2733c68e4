/**
 * Bedrock runtime invoker - the provider invocation collaborator for every
 * Bedrock model family.
 *
 * Bodies go out as UTF-8 JSON through InvokeModel; streamed `chunk.bytes`
 * parts are decoded one JSON event at a time.
 */
import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
  type ResponseStream,
} from "@aws-sdk/client-bedrock-runtime";
import { fromUtf8, toUtf8 } from "@smithy/util-utf8";
import type { BedrockConfig } from "@/config";
import {
  APIConnectionError,
  APIRequestError,
  APIServerError,
  ApiError,
  AuthenticationError,
  ConfigurationError,
  LLMIntegrationError,
  ModelNotFoundError,
  RateLimitError,
  StreamingError,
} from "@/errors";
import logger from "@/logging";
import { readString } from "@/routes/proxy/utils/provider-json";
import type { ProviderInvoker, ProviderPayload } from "@/types";

const CREDENTIAL_ERROR_NAMES = [
  "credential",
  "accessdenied",
  "unrecognizedclient",
  "invalidaccesskeyid",
  "invalidclienttokenid",
  "invalidsignature",
  "signaturedoesnotmatch",
  "expiredtoken",
];

const SERVICE_ERROR_NAMES = [
  "serviceunavailable",
  "internalserver",
  "modeltimeout",
  "modelnotready",
  "modelstreamerror",
  "modelerror",
];

const NETWORK_ERROR_MARKERS = ["timeouterror", "econn", "enotfound", "etimedout"];

/**
 * Translate an AWS SDK failure into the gateway error taxonomy.
 *
 * Error names are matched case-insensitively: blocking calls raise
 * PascalCase names, stream events camelCase ones. Unclassified failures
 * while consuming a stream are `StreamingError`.
 */
export function translateBedrockError(
  error: unknown,
  { midStream = false }: { midStream?: boolean } = {},
): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  const name = readString(error, "name") ?? "";
  const message = readString(error, "message") ?? String(error);
  const normalized = `${name} ${readString(error, "code") ?? ""}`.toLowerCase();
  const options = { code: name || undefined, cause: error };

  if (CREDENTIAL_ERROR_NAMES.some((marker) => normalized.includes(marker))) {
    return new AuthenticationError(`AWS authentication failed: ${message}`, options);
  }
  if (normalized.includes("throttling")) {
    return new RateLimitError(`Bedrock rate limit exceeded: ${message}`, options);
  }
  if (SERVICE_ERROR_NAMES.some((marker) => normalized.includes(marker))) {
    return new APIServerError(`Bedrock service error: ${message}`, options);
  }
  if (normalized.includes("resourcenotfound")) {
    return new ModelNotFoundError(`Bedrock model not found: ${message}`, options);
  }
  if (normalized.includes("validation")) {
    return new APIRequestError(`Bedrock rejected the request: ${message}`, options);
  }
  if (NETWORK_ERROR_MARKERS.some((marker) => normalized.includes(marker))) {
    return new APIConnectionError(`Could not reach Bedrock: ${message}`, options);
  }
  if (midStream) {
    return new StreamingError(`Bedrock stream failed: ${message}`, options);
  }
  return new APIServerError(`Bedrock call failed: ${message}`, options);
}

export interface BedrockInvokerOptions {
  maxAttempts: number;
}

export class BedrockRuntimeInvoker implements ProviderInvoker {
  private readonly client: BedrockRuntimeClient;

  constructor(client: BedrockRuntimeClient) {
    this.client = client;
  }

  /**
   * Static keys are used when both halves are configured; otherwise the SDK
   * default credential chain applies.
   */
  static fromConfig(
    bedrock: BedrockConfig,
    options: BedrockInvokerOptions,
  ): BedrockRuntimeInvoker {
    const { accessKeyId, secretAccessKey, sessionToken } = bedrock;
    if ((accessKeyId === undefined) !== (secretAccessKey === undefined)) {
      throw new ConfigurationError(
        "AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together",
      );
    }

    logger.info(
      {
        region: bedrock.region,
        staticCredentials: accessKeyId !== undefined,
        maxAttempts: options.maxAttempts,
      },
      "[BedrockRuntimeInvoker] creating client",
    );

    return new BedrockRuntimeInvoker(
      new BedrockRuntimeClient({
        region: bedrock.region,
        maxAttempts: options.maxAttempts,
        ...(accessKeyId !== undefined && secretAccessKey !== undefined
          ? { credentials: { accessKeyId, secretAccessKey, sessionToken } }
          : {}),
      }),
    );
  }

  async invoke(modelId: string, body: ProviderPayload): Promise<unknown> {
    try {
      const response = await this.client.send(
        new InvokeModelCommand({
          modelId,
          contentType: "application/json",
          accept: "application/json",
          body: fromUtf8(JSON.stringify(body)),
        }),
      );
      return decodeJson(response.body, modelId);
    } catch (error) {
      throw translateBedrockError(error);
    }
  }

  async *invokeStream(
    modelId: string,
    body: ProviderPayload,
  ): AsyncGenerator<unknown, void, undefined> {
    let events: AsyncIterable<ResponseStream> | undefined;
    try {
      const response = await this.client.send(
        new InvokeModelWithResponseStreamCommand({
          modelId,
          contentType: "application/json",
          accept: "application/json",
          body: fromUtf8(JSON.stringify(body)),
        }),
      );
      events = response.body;
    } catch (error) {
      throw translateBedrockError(error);
    }

    if (events === undefined) {
      throw new LLMIntegrationError(
        `Bedrock returned no event stream for ${modelId}`,
      );
    }

    try {
      for await (const event of events) {
        const decoded = decodeStreamEvent(event, modelId);
        if (decoded !== undefined) {
          yield decoded;
        }
      }
    } catch (error) {
      throw translateBedrockError(error, { midStream: true });
    }
  }
}

function decodeJson(bytes: Uint8Array, modelId: string): unknown {
  try {
    const parsed: unknown = JSON.parse(toUtf8(bytes));
    return parsed;
  } catch (error) {
    throw new LLMIntegrationError(
      `Bedrock returned a body that is not JSON for ${modelId}`,
      { cause: error },
    );
  }
}

/**
 * Payload parts decode to one JSON event; exception members are thrown.
 */
export function decodeStreamEvent(
  event: ResponseStream,
  modelId: string,
): unknown {
  const bytes = event.chunk?.bytes;
  if (bytes !== undefined) {
    return decodeJson(bytes, modelId);
  }
  for (const [member, value] of Object.entries(event)) {
    if (value instanceof Error) {
      throw translateBedrockError(value);
    }
    logger.debug({ modelId, member }, "[BedrockRuntimeInvoker] skipping stream member");
  }
  return undefined;
}
