/**
 * Uploaded-file context: fetch files by id, turn them into text and splice
 * the result into the conversation ahead of dispatch.
 */
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from "@aws-sdk/client-s3";
import { toUtf8 } from "@smithy/util-utf8";
import { parse as parseCsv } from "csv-parse/sync";
import { parse as parseHtml } from "node-html-parser";
import { z } from "zod";
import type { BedrockConfig } from "@/config";
import { ConfigurationError } from "@/errors";
import logger from "@/logging";
import type { Canonical } from "@/types";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type Message = Canonical.Types.Message;

const FILE_KEY_PREFIX = "files/";
const MAX_STRUCTURED_LENGTH = 2000;
const CSV_SAMPLE_ROWS = 5;

export interface StoredFile {
  fileId: string;
  filename: string;
  contentType: string;
}

export interface FileStore {
  getMetadata(fileId: string): Promise<StoredFile | undefined>;
  getContent(fileId: string): Promise<Uint8Array | undefined>;
}

// ===== S3 store =====

export class S3FileStore implements FileStore {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(client: S3Client, bucket: string) {
    this.client = client;
    this.bucket = bucket;
  }

  static fromConfig(
    bucket: string | undefined,
    bedrock: BedrockConfig,
  ): S3FileStore {
    if (bucket === undefined) {
      throw new ConfigurationError("S3_FILES_BUCKET is not configured");
    }
    const { accessKeyId, secretAccessKey, sessionToken } = bedrock;
    return new S3FileStore(
      new S3Client({
        region: bedrock.region,
        ...(accessKeyId !== undefined && secretAccessKey !== undefined
          ? { credentials: { accessKeyId, secretAccessKey, sessionToken } }
          : {}),
      }),
      bucket,
    );
  }

  static keyFor(fileId: string, filename: string): string {
    return `${FILE_KEY_PREFIX}${fileId}-${filename}`;
  }

  async getMetadata(fileId: string): Promise<StoredFile | undefined> {
    const prefix = `${FILE_KEY_PREFIX}${fileId}-`;
    const key = await this.findKey(prefix);
    if (key === undefined) {
      return undefined;
    }
    const head = await this.client.send(
      new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
    );
    return {
      fileId,
      filename: head.Metadata?.original_filename ?? key.slice(prefix.length),
      contentType: head.ContentType ?? "application/octet-stream",
    };
  }

  async getContent(fileId: string): Promise<Uint8Array | undefined> {
    const key = await this.findKey(`${FILE_KEY_PREFIX}${fileId}-`);
    if (key === undefined) {
      return undefined;
    }
    const object = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
    );
    return object.Body ? await object.Body.transformToByteArray() : undefined;
  }

  private async findKey(prefix: string): Promise<string | undefined> {
    const listing = await this.client.send(
      new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, MaxKeys: 1 }),
    );
    return listing.Contents?.[0]?.Key;
  }
}

// ===== Processing =====

export type ProcessedFile =
  | { success: true; text: string }
  | { success: false; error: string };

type Processor = (text: string, filename: string) => string;

const CsvRowsSchema = z.array(z.array(z.string()));

function readCsvRows(text: string): string[][] {
  return CsvRowsSchema.parse(
    parseCsv(text, { skip_empty_lines: true, relax_column_count: true }),
  );
}

function processCsv(text: string, filename: string): string {
  let rows: string[][];
  try {
    rows = readCsvRows(text);
  } catch (error) {
    logger.warn(
      { filename, err: error },
      "[FileProcessor] invalid CSV, treating as text",
    );
    return text;
  }
  if (rows.length === 0) {
    return "Empty CSV file";
  }

  const lines = [
    `CSV File: ${filename}`,
    `Headers: ${rows[0].join(", ")}`,
    `Total rows: ${rows.length - 1}`,
    "",
  ];
  for (const [index, row] of rows.slice(0, CSV_SAMPLE_ROWS + 1).entries()) {
    lines.push(
      index === 0
        ? `Row 0 (Headers): ${row.join(", ")}`
        : `Row ${index}: ${row.join(", ")}`,
    );
  }
  if (rows.length > CSV_SAMPLE_ROWS + 1) {
    lines.push(`... and ${rows.length - CSV_SAMPLE_ROWS - 1} more rows`);
  }
  return lines.join("\n");
}

function jsonTypeName(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

function describeJson(
  value: unknown,
  path: string,
  level: number,
  lines: string[],
): void {
  const indent = "  ".repeat(level);
  if (Array.isArray(value)) {
    lines.push(`${indent}Array at ${path || "root"} with ${value.length} items`);
    if (value.length > 0 && level < 2) {
      lines.push(`${indent}  Sample item type: ${jsonTypeName(value[0])}`);
      if (typeof value[0] === "object" && value[0] !== null) {
        describeJson(value[0], `${path}[0]`, level + 1, lines);
      }
    }
    return;
  }
  if (typeof value !== "object" || value === null) {
    return;
  }

  const entries = Object.entries(value);
  lines.push(`${indent}Object at ${path || "root"} with ${entries.length} keys:`);
  for (const [key, child] of entries) {
    const childPath = path ? `${path}.${key}` : key;
    if (typeof child === "object" && child !== null) {
      lines.push(`${indent}  ${key}: ${jsonTypeName(child)}`);
      if (level < 2) {
        describeJson(child, childPath, level + 1, lines);
      }
    } else {
      const rendered = String(child);
      const preview =
        rendered.length > 50 ? `${rendered.slice(0, 50)}...` : rendered;
      lines.push(`${indent}  ${key}: ${jsonTypeName(child)} = ${preview}`);
    }
  }
}

function withTruncation(label: string, body: string): string[] {
  return body.length > MAX_STRUCTURED_LENGTH
    ? [
        `\n${label} (truncated):`,
        `${body.slice(0, MAX_STRUCTURED_LENGTH)}\n... (truncated)`,
      ]
    : [`\n${label}:`, body];
}

function processJson(text: string, filename: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    logger.warn(
      { filename, err: error },
      "[FileProcessor] invalid JSON, treating as text",
    );
    return text;
  }
  const lines = [`JSON File: ${filename}`];
  describeJson(parsed, "", 0, lines);
  lines.push(...withTruncation("JSON Content", JSON.stringify(parsed, null, 2)));
  return lines.join("\n");
}

function processXml(text: string, filename: string): string {
  return [`XML File: ${filename}`, ...withTruncation("XML Content", text)].join("\n");
}

function processHtml(text: string, filename: string): string {
  const root = parseHtml(text);
  for (const node of root.querySelectorAll("script, style")) {
    node.remove();
  }
  const extracted = root.text.replace(/\s+/g, " ").trim();
  return [`HTML File: ${filename}`, "Extracted text content:", extracted].join("\n");
}

const passThrough: Processor = (text) => text;

const PROCESSORS: Readonly<Record<string, Processor>> = {
  "text/plain": passThrough,
  "text/markdown": passThrough,
  "text/x-python": passThrough,
  "application/javascript": passThrough,
  "text/csv": processCsv,
  "application/json": processJson,
  "application/xml": processXml,
  "text/xml": processXml,
  "text/html": processHtml,
};

export class FileProcessor {
  canProcess(contentType: string): boolean {
    return Object.hasOwn(PROCESSORS, contentType);
  }

  get supportedTypes(): string[] {
    return Object.keys(PROCESSORS);
  }

  process(content: Uint8Array, contentType: string, filename: string): ProcessedFile {
    if (!this.canProcess(contentType)) {
      return { success: false, error: `Unsupported file type: ${contentType}` };
    }
    return { success: true, text: PROCESSORS[contentType](toUtf8(content), filename) };
  }
}

// ===== Context assembly =====

export class FileContextService {
  private readonly store: FileStore;
  private readonly processor: FileProcessor;

  constructor(store: FileStore, processor: FileProcessor = new FileProcessor()) {
    this.store = store;
    this.processor = processor;
  }

  /**
   * Framed text blob for the given files; empty when none could be read
   */
  async buildContext(fileIds: string[]): Promise<string> {
    const sections: string[] = [];
    for (const fileId of fileIds) {
      const section = await this.describeFile(fileId);
      if (section !== undefined) {
        sections.push(section);
      }
    }
    if (sections.length === 0) {
      return "";
    }
    return [
      "=== UPLOADED FILES CONTEXT ===",
      "The following files have been uploaded and their content is provided below for your reference:",
      "",
      ...sections,
      "=== END OF FILES CONTEXT ===\n",
    ].join("\n");
  }

  private async describeFile(fileId: string): Promise<string | undefined> {
    try {
      const metadata = await this.store.getMetadata(fileId);
      if (metadata === undefined) {
        logger.warn({ fileId }, "[FileContextService] file not found, skipping");
        return undefined;
      }
      const content = await this.store.getContent(fileId);
      if (content === undefined || content.length === 0) {
        logger.warn({ fileId }, "[FileContextService] file has no content, skipping");
        return undefined;
      }

      const heading = `=== File: ${metadata.filename} (ID: ${fileId}) ===`;
      const processed = this.processor.process(
        content,
        metadata.contentType,
        metadata.filename,
      );
      if (!processed.success) {
        logger.warn(
          { fileId, error: processed.error },
          "[FileContextService] file could not be processed",
        );
        return `${heading}\n[File content could not be processed: ${processed.error}]\n`;
      }
      return `${heading}\n${processed.text}\n`;
    } catch (error) {
      logger.error({ fileId, err: error }, "[FileContextService] error reading file");
      const message = error instanceof Error ? error.message : String(error);
      return `=== File: ${fileId} ===\n[Error processing file: ${message}]\n`;
    }
  }
}

/**
 * Prepend file context to the first user message, or add a leading system
 * message when there is none
 */
export function applyFileContext(
  request: ChatCompletionRequest,
  context: string,
): ChatCompletionRequest {
  if (!context) {
    return request;
  }
  const userIndex = request.messages.findIndex((message) => message.role === "user");
  if (userIndex === -1) {
    return {
      ...request,
      messages: [{ role: "system", content: context }, ...request.messages],
    };
  }

  const messages = request.messages.map((message, index): Message => {
    if (index !== userIndex) {
      return message;
    }
    const { content } = message;
    if (content === null || content === undefined) {
      return { ...message, content: context };
    }
    if (typeof content === "string") {
      return { ...message, content: `${context}\n\n${content}` };
    }
    return { ...message, content: [{ type: "text", text: context }, ...content] };
  });
  return { ...request, messages };
}
