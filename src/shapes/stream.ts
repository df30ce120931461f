// Stream helpers shared by the call shapes

import type { StreamChunk } from "../types/transport";
import {
  FailoverError,
  FailoverErrorCodes,
  errorMessage,
} from "../utils/errors";

/**
 * Type guard for async iterables
 */
export function isAsyncIterable(
  value: unknown,
): value is AsyncIterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === "function"
  );
}

/**
 * Turn a raw event stream into chunks.
 *
 * `toChunk` returns `null` to skip an event, or throws to report an error
 * event embedded in the stream. The generator ends when the source ends;
 * any error from the source is rethrown as a STREAM_ERROR carrying the
 * text read so far.
 *
 * @typeParam T - The event type of the source stream
 */
export async function* toStreamChunks<T>(
  source: AsyncIterable<T>,
  toChunk: (event: T) => StreamChunk | null,
): AsyncGenerator<StreamChunk> {
  let collected = "";
  try {
    for await (const event of source) {
      const chunk = toChunk(event);
      if (chunk === null) continue;
      if (chunk.type === "text") collected += chunk.value;
      yield chunk;
    }
  } catch (error) {
    throw new FailoverError(
      `Error processing event stream: ${errorMessage(error)}`,
      {
        code: FailoverErrorCodes.STREAM_ERROR,
        partialContent: collected,
        cause: error,
      },
    );
  }
}

/**
 * Read a chunk sequence to the end and concatenate its text.
 * Event chunks are serialized as JSON.
 */
export async function collectStream(
  chunks: AsyncIterable<StreamChunk>,
): Promise<string> {
  let output = "";
  for await (const chunk of chunks) {
    output +=
      chunk.type === "text" ? chunk.value : JSON.stringify(chunk.value);
  }
  return output;
}

/**
 * Stream that was expected but is missing from a response
 */
export function missingStreamError(field: string): FailoverError {
  return new FailoverError(`Response field "${field}" is not a stream`, {
    code: FailoverErrorCodes.STREAM_ERROR,
    partialContent: "",
  });
}
