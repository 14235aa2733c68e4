/**
 * Knowledge base access through Bedrock Agent Runtime
 */
import {
  BedrockAgentRuntimeClient,
  type KnowledgeBaseRetrievalResult,
  RetrieveAndGenerateCommand,
  RetrieveCommand,
  type RetrievedReference,
} from "@aws-sdk/client-bedrock-agent-runtime";
import { translateBedrockError } from "@/clients/bedrock-client";
import type { BedrockConfig } from "@/config";
import { ConfigurationError, LLMIntegrationError } from "@/errors";
import logger from "@/logging";

export interface RetrievedPassage {
  content: string;
  score: number | undefined;
  source: string | undefined;
  title: string | undefined;
}

export interface RetrieveParams {
  knowledgeBaseId: string;
  query: string;
  maxResults: number;
}

export interface RetrieveAndGenerateParams {
  knowledgeBaseId: string;
  query: string;
  modelArn: string;
  /** Only sent when the request set temperature or max_tokens */
  textInference?: { temperature?: number; maxTokens: number };
  sessionId?: string;
}

export interface CitationReference {
  content: string;
  uri: string | undefined;
  locationType: string | undefined;
}

export interface KnowledgeBaseCitation {
  references: CitationReference[];
}

export interface RetrieveAndGenerateResult {
  output: string;
  citations: KnowledgeBaseCitation[];
  sessionId: string | null;
}

export interface KnowledgeBaseClient {
  retrieve(params: RetrieveParams): Promise<RetrievedPassage[]>;
  retrieveAndGenerate(
    params: RetrieveAndGenerateParams,
  ): Promise<RetrieveAndGenerateResult>;
}

function metadataString(
  metadata: Record<string, unknown> | undefined,
  key: string,
): string | undefined {
  const value = metadata?.[key];
  return typeof value === "string" ? value : undefined;
}

function toPassage(result: KnowledgeBaseRetrievalResult): RetrievedPassage {
  const metadata = result.metadata;
  return {
    content: result.content?.text ?? "",
    score: result.score,
    source:
      metadataString(metadata, "source") ??
      result.location?.s3Location?.uri ??
      metadataString(metadata, "x-amz-bedrock-kb-source-uri"),
    title: metadataString(metadata, "title"),
  };
}

function toReference(reference: RetrievedReference): CitationReference {
  return {
    content: reference.content?.text ?? "",
    uri: reference.location?.s3Location?.uri,
    locationType: reference.location?.type,
  };
}

export class BedrockKnowledgeBaseClient implements KnowledgeBaseClient {
  private readonly client: BedrockAgentRuntimeClient;

  constructor(client: BedrockAgentRuntimeClient) {
    this.client = client;
  }

  static fromConfig(
    bedrock: BedrockConfig,
    options: { maxAttempts: number },
  ): BedrockKnowledgeBaseClient {
    const { accessKeyId, secretAccessKey, sessionToken } = bedrock;
    if ((accessKeyId === undefined) !== (secretAccessKey === undefined)) {
      throw new ConfigurationError(
        "AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together",
      );
    }
    return new BedrockKnowledgeBaseClient(
      new BedrockAgentRuntimeClient({
        region: bedrock.region,
        maxAttempts: options.maxAttempts,
        ...(accessKeyId !== undefined && secretAccessKey !== undefined
          ? { credentials: { accessKeyId, secretAccessKey, sessionToken } }
          : {}),
      }),
    );
  }

  async retrieve({
    knowledgeBaseId,
    query,
    maxResults,
  }: RetrieveParams): Promise<RetrievedPassage[]> {
    try {
      const response = await this.client.send(
        new RetrieveCommand({
          knowledgeBaseId,
          retrievalQuery: { text: query },
          retrievalConfiguration: {
            vectorSearchConfiguration: { numberOfResults: maxResults },
          },
        }),
      );
      const passages = (response.retrievalResults ?? []).map(toPassage);
      logger.debug(
        { knowledgeBaseId, results: passages.length },
        "[BedrockKnowledgeBaseClient] retrieve completed",
      );
      return passages;
    } catch (error) {
      throw translateBedrockError(error);
    }
  }

  async retrieveAndGenerate({
    knowledgeBaseId,
    query,
    modelArn,
    textInference,
    sessionId,
  }: RetrieveAndGenerateParams): Promise<RetrieveAndGenerateResult> {
    let output: string | undefined;
    let citations: KnowledgeBaseCitation[];
    let returnedSessionId: string | undefined;
    try {
      const response = await this.client.send(
        new RetrieveAndGenerateCommand({
          input: { text: query },
          sessionId,
          retrieveAndGenerateConfiguration: {
            type: "KNOWLEDGE_BASE",
            knowledgeBaseConfiguration: {
              knowledgeBaseId,
              modelArn,
              ...(textInference
                ? {
                    generationConfiguration: {
                      inferenceConfig: { textInferenceConfig: textInference },
                    },
                  }
                : {}),
            },
          },
        }),
      );
      output = response.output?.text;
      citations = (response.citations ?? []).map((citation) => ({
        references: (citation.retrievedReferences ?? []).map(toReference),
      }));
      returnedSessionId = response.sessionId;
    } catch (error) {
      throw translateBedrockError(error);
    }

    if (output === undefined) {
      throw new LLMIntegrationError(
        `Knowledge base ${knowledgeBaseId} returned no generated output`,
        { code: "empty_response" },
      );
    }
    return { output, citations, sessionId: returnedSessionId ?? null };
  }
}
