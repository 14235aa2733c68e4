export const SSE_DONE_FRAME = "data: [DONE]\n\n";

export function toSSEFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function getSSEHeaders(): Record<string, string> {
  return {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  };
}

type SinkEvent = "drain" | "close";

/** The parts of a `ServerResponse` that frame writing touches */
export interface SSESink {
  write(chunk: string): boolean;
  once(event: SinkEvent, listener: () => void): unknown;
  off(event: SinkEvent, listener: () => void): unknown;
}

/**
 * Resolves once the frame is flushed or, when the socket buffer is full,
 * once it drains or closes
 */
export async function writeSSEFrame(sink: SSESink, frame: string): Promise<void> {
  if (sink.write(frame)) {
    return;
  }
  await new Promise<void>((resolve) => {
    const settle = () => {
      sink.off("drain", settle);
      sink.off("close", settle);
      resolve();
    };
    sink.once("drain", settle);
    sink.once("close", settle);
  });
}
