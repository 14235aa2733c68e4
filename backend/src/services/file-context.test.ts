import { describe, expect, InMemoryFileStore, test, vi } from "@/test";
import {
  applyFileContext,
  FileContextService,
  FileProcessor,
  type FileStore,
  S3FileStore,
} from "./file-context";

const encode = (text: string) => new TextEncoder().encode(text);

describe("FileProcessor", () => {
  const processor = new FileProcessor();

  test("passes text-like files through", () => {
    expect(processor.process(encode("hello"), "text/plain", "a.txt")).toEqual({
      success: true,
      text: "hello",
    });
    expect(processor.canProcess("text/markdown")).toBe(true);
  });

  test("summarises CSV headers and sample rows", () => {
    const csv = 'name,age\nAda,36\n"Lovelace, A",37\n';
    expect(processor.process(encode(csv), "text/csv", "people.csv")).toEqual({
      success: true,
      text: [
        "CSV File: people.csv",
        "Headers: name, age",
        "Total rows: 2",
        "",
        "Row 0 (Headers): name, age",
        "Row 1: Ada, 36",
        "Row 2: Lovelace, A, 37",
      ].join("\n"),
    });
  });

  test("keeps quoted newlines inside one CSV cell", () => {
    const csv = 'name,note\nAda,"first line\nsecond line"\n';
    expect(processor.process(encode(csv), "text/csv", "notes.csv")).toEqual({
      success: true,
      text: [
        "CSV File: notes.csv",
        "Headers: name, note",
        "Total rows: 1",
        "",
        "Row 0 (Headers): name, note",
        "Row 1: Ada, first line\nsecond line",
      ].join("\n"),
    });
  });

  test("falls back to raw text for malformed CSV", () => {
    const csv = 'name\n"unterminated\n';
    expect(processor.process(encode(csv), "text/csv", "bad.csv")).toEqual({
      success: true,
      text: csv,
    });
  });

  test("counts CSV rows beyond the sample", () => {
    const rows = ["id", "1", "2", "3", "4", "5", "6", "7", "8"].join("\n");
    const result = processor.process(encode(rows), "text/csv", "ids.csv");
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.text.split("\n").at(-1)).toBe("... and 3 more rows");
    }
  });

  test("describes JSON structure before the pretty-printed copy", () => {
    const json = '{"name":"gateway","tags":["a"]}';
    expect(processor.process(encode(json), "application/json", "c.json")).toEqual({
      success: true,
      text: [
        "JSON File: c.json",
        "Object at root with 2 keys:",
        "  name: string = gateway",
        "  tags: array",
        "  Array at tags with 1 items",
        "    Sample item type: string",
        "\nJSON Content:",
        '{\n  "name": "gateway",\n  "tags": [\n    "a"\n  ]\n}',
      ].join("\n"),
    });
  });

  test("truncates long JSON", () => {
    const json = JSON.stringify({ blob: "x".repeat(3000) });
    const result = processor.process(encode(json), "application/json", "big.json");
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.text).toContain("\nJSON Content (truncated):\n");
      expect(result.text.endsWith("\n... (truncated)")).toBe(true);
    }
  });

  test("falls back to raw text for invalid JSON", () => {
    expect(
      processor.process(encode("{not json"), "application/json", "bad.json"),
    ).toEqual({ success: true, text: "{not json" });
  });

  test("keeps XML with a header", () => {
    expect(processor.process(encode("<a>1</a>"), "text/xml", "d.xml")).toEqual({
      success: true,
      text: "XML File: d.xml\n\nXML Content:\n<a>1</a>",
    });
  });

  test("strips HTML tags, scripts and styles", () => {
    const html =
      "<html><head><style>p{color:red}</style><script>alert(1)</script></head>" +
      "<body><p>Hello   <b>world</b></p></body></html>";
    expect(processor.process(encode(html), "text/html", "page.html")).toEqual({
      success: true,
      text: "HTML File: page.html\nExtracted text content:\nHello world",
    });
  });

  test("reads text around attributes that contain a closing bracket", () => {
    const html = '<p title="a > b">Tide <i>tables</i> &amp; charts</p>';
    expect(processor.process(encode(html), "text/html", "tides.html")).toEqual({
      success: true,
      text: "HTML File: tides.html\nExtracted text content:\nTide tables & charts",
    });
  });

  test("reports unsupported types", () => {
    expect(processor.process(encode("%PDF"), "application/pdf", "a.pdf")).toEqual({
      success: false,
      error: "Unsupported file type: application/pdf",
    });
  });
});

describe("FileContextService", () => {
  test("frames each readable file and skips missing ones", async () => {
    const service = new FileContextService(
      new InMemoryFileStore([
        {
          fileId: "file-1",
          filename: "notes.txt",
          contentType: "text/plain",
          content: "Remember the milk",
        },
        {
          fileId: "file-2",
          filename: "scan.pdf",
          contentType: "application/pdf",
          content: "%PDF",
        },
      ]),
    );

    expect(await service.buildContext(["file-1", "missing", "file-2"])).toBe(
      [
        "=== UPLOADED FILES CONTEXT ===",
        "The following files have been uploaded and their content is provided below for your reference:",
        "",
        "=== File: notes.txt (ID: file-1) ===",
        "Remember the milk",
        "",
        "=== File: scan.pdf (ID: file-2) ===",
        "[File content could not be processed: Unsupported file type: application/pdf]",
        "",
        "=== END OF FILES CONTEXT ===",
        "",
      ].join("\n"),
    );
  });

  test("returns nothing when no file could be read", async () => {
    const service = new FileContextService(
      new InMemoryFileStore([
        { fileId: "empty", filename: "e.txt", contentType: "text/plain", content: "" },
      ]),
    );
    expect(await service.buildContext(["empty", "missing"])).toBe("");
  });

  test("store failures become an error note for that file", async () => {
    const store: FileStore = {
      getMetadata: vi.fn(async () => {
        throw new Error("bucket offline");
      }),
      getContent: vi.fn(async () => undefined),
    };
    const context = await new FileContextService(store).buildContext(["file-9"]);
    expect(context).toContain(
      "\n=== File: file-9 ===\n[Error processing file: bucket offline]\n",
    );
  });
});

describe("applyFileContext", () => {
  test("prepends to the first user message only", ({ makeChatRequest }) => {
    const request = makeChatRequest({
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Summarise it" },
        { role: "user", content: "Thanks" },
      ],
    });
    expect(applyFileContext(request, "FILES").messages).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "FILES\n\nSummarise it" },
      { role: "user", content: "Thanks" },
    ]);
  });

  test("adds a text block ahead of block content", ({ makeChatRequest }) => {
    const request = makeChatRequest({
      messages: [{ role: "user", content: [{ type: "text", text: "What is this?" }] }],
    });
    expect(applyFileContext(request, "FILES").messages[0].content).toEqual([
      { type: "text", text: "FILES" },
      { type: "text", text: "What is this?" },
    ]);
  });

  test("inserts a system message when there is no user turn", ({
    makeChatRequest,
  }) => {
    const request = makeChatRequest({
      messages: [{ role: "assistant", content: "Hello" }],
    });
    expect(applyFileContext(request, "FILES").messages).toEqual([
      { role: "system", content: "FILES" },
      { role: "assistant", content: "Hello" },
    ]);
  });

  test("returns the same request for empty context", ({ makeChatRequest }) => {
    const request = makeChatRequest();
    expect(applyFileContext(request, "")).toBe(request);
  });
});

describe("S3FileStore", () => {
  test("stores files under files/<id>-<filename>", () => {
    expect(S3FileStore.keyFor("abc", "notes.txt")).toBe("files/abc-notes.txt");
  });
});
