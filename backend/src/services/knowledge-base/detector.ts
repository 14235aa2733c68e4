/**
 * Decides whether a chat request should consult a knowledge base, and what
 * to ask it. Pure: keyword and pattern tables come from retrieval-keywords.json.
 */
import { z } from "zod";
import logger from "@/logging";
import { contentToText } from "@/routes/proxy/utils/content";
import type { Canonical } from "@/types";
import keywordTable from "./retrieval-keywords.json";

type Message = Canonical.Types.Message;
type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

const WeightedKeywordsSchema = z.object({
  keywords: z.array(z.string()),
  weight: z.number(),
  cap: z.number(),
});

const KeywordTableSchema = z.object({
  retrievalKeywords: z.array(z.string()),
  questionPatterns: z.array(z.string()),
  filePatterns: z.array(z.string()),
  documentMentions: z.array(z.string()),
  followUpIndicators: z.array(z.string()),
  confidence: z.object({
    strong: WeightedKeywordsSchema,
    medium: WeightedKeywordsSchema,
    weak: WeightedKeywordsSchema,
    questionMark: z.number(),
    contextWords: z.array(z.string()),
    contextBoost: z.number(),
  }),
  queryFillerPrefixes: z.array(z.string()),
  genericQueries: z.array(z.string()),
  simpleQuestionIndicators: z.array(z.string()),
});

const KEYWORDS = KeywordTableSchema.parse(keywordTable);

const QUESTION_PATTERNS = KEYWORDS.questionPatterns.map(
  (pattern) => new RegExp(pattern, "i"),
);
const FILE_PATTERNS = KEYWORDS.filePatterns.map(
  (pattern) => new RegExp(pattern, "i"),
);

const KB_ID_FIELDS = ["knowledge_base_id", "knowledgeBaseId", "kb_id", "kbId"];

function userTexts(messages: Message[]): string[] {
  return messages
    .filter((message) => message.role === "user")
    .map((message) => contentToText(message.content));
}

function countMatches(content: string, keywords: string[]): number {
  return keywords.filter((keyword) => content.includes(keyword)).length;
}

export interface KnowledgeBaseSignals {
  knowledgeBaseId: string | undefined;
  autoKb: boolean;
}

export class KnowledgeBaseDetector {
  /**
   * First non-empty id among the accepted spellings
   */
  extractKnowledgeBaseId(raw: Record<string, unknown>): string | undefined {
    for (const field of KB_ID_FIELDS) {
      const value = raw[field];
      if (
        (typeof value === "string" && value.length > 0) ||
        typeof value === "number"
      ) {
        return String(value);
      }
    }
    return undefined;
  }

  shouldUseKnowledgeBase(
    request: ChatCompletionRequest,
    { knowledgeBaseId, autoKb }: KnowledgeBaseSignals,
  ): boolean {
    if (knowledgeBaseId || request.knowledge_base_id) {
      return true;
    }
    if (!autoKb) {
      return false;
    }
    if (request.file_ids && request.file_ids.length > 0) {
      logger.debug("[KnowledgeBaseDetector] file_ids present, using KB");
      return true;
    }
    return this.hasRetrievalIntent(request.messages);
  }

  /**
   * Keyword-weighted score in [0, 1] for the latest user turn
   */
  getRetrievalConfidence(messages: Message[]): number {
    const texts = userTexts(messages);
    if (texts.length === 0) {
      return 0;
    }
    const content = texts[texts.length - 1].toLowerCase();
    const { strong, medium, weak, questionMark, contextWords, contextBoost } =
      KEYWORDS.confidence;

    let score = 0;
    for (const tier of [strong, medium, weak]) {
      score += Math.min(countMatches(content, tier.keywords) * tier.weight, tier.cap);
    }
    if (content.includes("?")) {
      score += questionMark;
    }
    if (texts.length > 1) {
      const previous = texts.slice(0, -1).join(" ").toLowerCase();
      if (contextWords.some((word) => previous.includes(word))) {
        score += contextBoost;
      }
    }
    return Math.min(score, 1);
  }

  /**
   * Retrieval query derived from the latest user turn, or null when the turn
   * is too short or too generic to search with
   */
  suggestQuery(messages: Message[]): string | null {
    const texts = userTexts(messages);
    if (texts.length === 0) {
      return null;
    }

    let query = texts[texts.length - 1].trim();
    const lowered = query.toLowerCase();
    const filler = KEYWORDS.queryFillerPrefixes.find((phrase) =>
      lowered.startsWith(phrase),
    );
    if (filler !== undefined) {
      query = query.slice(filler.length).trim();
    }
    query = query.replace(/[?!.,]+$/, "");

    if (query.split(/\s+/).filter(Boolean).length < 2) {
      return null;
    }
    if (KEYWORDS.genericQueries.includes(query.toLowerCase())) {
      return null;
    }
    return query;
  }

  /**
   * Simple factual questions suit retrieve-and-generate better than augmentation
   */
  isSimpleQuestion(messages: Message[]): boolean {
    const texts = userTexts(messages);
    if (texts.length === 0) {
      return false;
    }
    const latest = texts[texts.length - 1].toLowerCase();
    return KEYWORDS.simpleQuestionIndicators.some((indicator) =>
      latest.includes(indicator),
    );
  }

  private hasRetrievalIntent(messages: Message[]): boolean {
    const texts = userTexts(messages);
    if (texts.length === 0) {
      return false;
    }
    const content = texts[texts.length - 1].toLowerCase();

    if (KEYWORDS.retrievalKeywords.some((keyword) => content.includes(keyword))) {
      logger.debug("[KnowledgeBaseDetector] retrieval keyword detected");
      return true;
    }
    if (QUESTION_PATTERNS.some((pattern) => pattern.test(content))) {
      logger.debug("[KnowledgeBaseDetector] retrieval pattern detected");
      return true;
    }
    if (FILE_PATTERNS.some((pattern) => pattern.test(content))) {
      logger.debug("[KnowledgeBaseDetector] file pattern detected");
      return true;
    }
    return this.isDocumentFollowUp(texts);
  }

  private isDocumentFollowUp(texts: string[]): boolean {
    if (texts.length < 2) {
      return false;
    }
    const previous = texts.slice(0, -1).join(" ").toLowerCase();
    if (!KEYWORDS.documentMentions.some((mention) => previous.includes(mention))) {
      return false;
    }
    const current = texts[texts.length - 1].toLowerCase();
    return KEYWORDS.followUpIndicators.some((indicator) =>
      current.includes(indicator),
    );
  }
}
