/**
 * Split a byte stream into text lines. A trailing partial line is held back
 * until the next chunk (or the end of the stream) completes it.
 */
export async function* readLines(
  body: ReadableStream<Uint8Array>,
  onChunk?: () => void,
): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      onChunk?.();

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        yield line.endsWith('\r') ? line.slice(0, -1) : line;
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer;
    }
  } finally {
    reader.releaseLock();
  }
}

/** Payload of an SSE `data:` line, or undefined for comments, blank lines and other fields. */
export function sseData(line: string): string | undefined {
  if (!line.startsWith('data:')) return undefined;
  const data = line.slice(5);
  return data.startsWith(' ') ? data.slice(1) : data;
}
