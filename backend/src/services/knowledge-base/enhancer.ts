/**
 * Knowledge-base enhancement step. Either answers the request outright with
 * retrieve-and-generate (direct RAG), or splices retrieved passages into the
 * system prompt and lets normal dispatch continue.
 */
import logger from "@/logging";
import { contentToText } from "@/routes/proxy/utils/content";
import type { Canonical } from "@/types";
import type {
  KnowledgeBaseCitation,
  KnowledgeBaseClient,
  RetrieveAndGenerateResult,
  RetrievedPassage,
} from "./client";
import { KnowledgeBaseDetector } from "./detector";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type Message = Canonical.Types.Message;

const DIRECT_RAG_CONFIDENCE = 0.7;
const DEFAULT_MAX_RESULTS = 5;
const DEFAULT_RAG_MAX_TOKENS = 1000;
const EXCERPT_MIN_LENGTH = 50;
const EXCERPT_LENGTH = 100;

export type EnhancementResult =
  | { kind: "request"; request: ChatCompletionRequest }
  | { kind: "response"; response: ChatCompletionResponse };

export interface KnowledgeBaseEnhancerOptions {
  client: KnowledgeBaseClient;
  /** Region used in the foundation-model ARN handed to retrieve-and-generate */
  region: string;
  detector?: KnowledgeBaseDetector;
  now?: () => Date;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function latestUserText(messages: Message[]): string {
  const users = messages.filter((message) => message.role === "user");
  return users.length > 0 ? contentToText(users[users.length - 1].content) : "";
}

function readMaxResults(config: Record<string, unknown> | undefined): number {
  const value = config?.max_results;
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : DEFAULT_MAX_RESULTS;
}

export function buildContextPrompt(
  passages: RetrievedPassage[],
  query: string,
): string {
  const parts: string[] = [];
  for (const [offset, passage] of passages.slice(0, DEFAULT_MAX_RESULTS).entries()) {
    parts.push(`Context ${offset + 1}: ${passage.content}`);
    const sourceInfo = [
      passage.source !== undefined ? `Source: ${passage.source}` : undefined,
      passage.title !== undefined ? `Title: ${passage.title}` : undefined,
    ].filter((entry): entry is string => entry !== undefined);
    if (sourceInfo.length > 0) {
      parts.push(`(${sourceInfo.join(", ")})`);
    }
  }

  return [
    "Based on the following relevant information from the knowledge base, please answer the user's question:",
    "",
    parts.join("\n\n"),
    "",
    "Instructions:",
    "- Use the provided context to answer the user's question accurately",
    "- If the context doesn't contain relevant information, mention that the information isn't available in the knowledge base",
    '- Cite specific context sections when referencing information (e.g., "According to Context 1...")',
    "- Be concise but comprehensive in your response",
    "",
    `User's question: ${query}`,
  ].join("\n");
}

/**
 * Prepend the context prompt to every system message, or add one up front
 */
export function augmentMessages(
  messages: Message[],
  contextPrompt: string,
): Message[] {
  if (!messages.some((message) => message.role === "system")) {
    return [{ role: "system", content: contextPrompt }, ...messages];
  }
  return messages.map((message) => {
    if (message.role !== "system") {
      return message;
    }
    const existing = contentToText(message.content);
    return {
      ...message,
      content: existing ? `${contextPrompt}\n\n${existing}` : contextPrompt,
    };
  });
}

export function formatCitations(
  text: string,
  citations: KnowledgeBaseCitation[],
): string {
  const notes: string[] = [];
  for (const [offset, citation] of citations.entries()) {
    for (const reference of citation.references) {
      const sourceInfo: string[] = [];
      if (reference.uri !== undefined) {
        sourceInfo.push(`Document: ${reference.uri}`);
      }
      if (reference.locationType !== undefined) {
        sourceInfo.push(`Type: ${reference.locationType}`);
      }
      notes.push(`[${offset + 1}] ${sourceInfo.join(", ")}`);

      if (reference.content.length > EXCERPT_MIN_LENGTH) {
        const excerpt =
          reference.content.length > EXCERPT_LENGTH
            ? `${reference.content.slice(0, EXCERPT_LENGTH)}...`
            : reference.content;
        notes.push(`    Excerpt: "${excerpt}"`);
      }
    }
  }
  return notes.length > 0 ? `${text}\n\n**Sources:**\n${notes.join("\n")}` : text;
}

export class KnowledgeBaseEnhancer {
  private readonly client: KnowledgeBaseClient;
  private readonly region: string;
  private readonly detector: KnowledgeBaseDetector;
  private readonly now: () => Date;

  constructor(options: KnowledgeBaseEnhancerOptions) {
    this.client = options.client;
    this.region = options.region;
    this.detector = options.detector ?? new KnowledgeBaseDetector();
    this.now = options.now ?? (() => new Date());
  }

  async enhance(
    request: ChatCompletionRequest,
    raw: Record<string, unknown>,
  ): Promise<EnhancementResult> {
    const knowledgeBaseId =
      request.knowledge_base_id ?? this.detector.extractKnowledgeBaseId(raw);

    if (knowledgeBaseId !== undefined && this.shouldUseDirectRag(request)) {
      try {
        const response = await this.answerDirectly(request, knowledgeBaseId);
        if (response !== undefined) {
          return { kind: "response", response };
        }
      } catch (error) {
        logger.error(
          { err: error, knowledgeBaseId },
          "[KnowledgeBaseEnhancer] direct RAG failed, falling back to augmentation",
        );
      }
    }

    return { kind: "request", request: await this.augment(request, raw, knowledgeBaseId) };
  }

  shouldUseDirectRag(request: ChatCompletionRequest): boolean {
    return (
      this.detector.getRetrievalConfidence(request.messages) > DIRECT_RAG_CONFIDENCE ||
      this.detector.isSimpleQuestion(request.messages)
    );
  }

  private async answerDirectly(
    request: ChatCompletionRequest,
    knowledgeBaseId: string,
  ): Promise<ChatCompletionResponse | undefined> {
    const query = latestUserText(request.messages);
    if (!query) {
      logger.debug("[KnowledgeBaseEnhancer] no user text for direct RAG");
      return undefined;
    }

    const { temperature, max_tokens } = request;
    const result = await this.client.retrieveAndGenerate({
      knowledgeBaseId,
      query,
      modelArn: `arn:aws:bedrock:${this.region}::foundation-model/${request.model}`,
      ...(temperature || max_tokens
        ? {
            textInference: {
              temperature,
              maxTokens: max_tokens || DEFAULT_RAG_MAX_TOKENS,
            },
          }
        : {}),
    });

    logger.info(
      { knowledgeBaseId, citations: result.citations.length },
      "[KnowledgeBaseEnhancer] direct RAG answered request",
    );
    return this.toResponse(result, request);
  }

  toResponse(
    result: RetrieveAndGenerateResult,
    request: ChatCompletionRequest,
  ): ChatCompletionResponse {
    const text =
      request.citation_format === "openai" && result.citations.length > 0
        ? formatCitations(result.output, result.citations)
        : result.output;

    const now = this.now();
    const lastMessage = request.messages[request.messages.length - 1];
    const promptTokens = wordCount(contentToText(lastMessage.content));
    const completionTokens = wordCount(text);

    return {
      id: `chatcmpl-kb-${now.toISOString().replace(/\D/g, "").slice(0, 14)}`,
      object: "chat.completion",
      created: Math.floor(now.getTime() / 1000),
      model: request.model,
      choices: [
        {
          index: 0,
          message: { role: "assistant", content: text },
          finish_reason: "stop",
        },
      ],
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
      },
      ...(result.citations.length > 0 || result.sessionId !== null
        ? {
            kb_metadata: {
              knowledge_base_used: true,
              citations_count: result.citations.length,
              session_id: result.sessionId,
            },
          }
        : {}),
    };
  }

  private async augment(
    request: ChatCompletionRequest,
    raw: Record<string, unknown>,
    knowledgeBaseId: string | undefined,
  ): Promise<ChatCompletionRequest> {
    const autoKb = request.auto_kb ?? raw.auto_kb === true;
    if (!this.detector.shouldUseKnowledgeBase(request, { knowledgeBaseId, autoKb })) {
      return request;
    }
    if (knowledgeBaseId === undefined) {
      logger.warn("[KnowledgeBaseEnhancer] retrieval intent detected but no knowledge base id given");
      return request;
    }

    const query = this.detector.suggestQuery(request.messages);
    if (query === null) {
      logger.debug("[KnowledgeBaseEnhancer] no usable retrieval query");
      return request;
    }

    logger.info({ knowledgeBaseId, query }, "[KnowledgeBaseEnhancer] augmenting request");
    const passages = await this.client.retrieve({
      knowledgeBaseId,
      query,
      maxResults: readMaxResults(request.retrieval_config),
    });
    if (passages.length === 0) {
      return request;
    }

    return {
      ...request,
      messages: augmentMessages(request.messages, buildContextPrompt(passages, query)),
    };
  }
}
