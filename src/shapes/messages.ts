// Messages call shape: structured conversation calls

import { z } from "zod";
import type {
  MessagesInputBase,
  ReadStreamOptions,
  StreamChunk,
} from "../types/transport";
import { CallShapes } from "../types/transport";
import type { CallShapeHandler } from "./types";
import { isAsyncIterable, missingStreamError, toStreamChunks } from "./stream";

const TextBlockSchema = z.object({ text: z.string() });

const MessagesResponseSchema = z.object({
  output: z.object({
    message: z.object({
      content: z.array(z.unknown()),
    }),
  }),
});

const ContentDeltaEventSchema = z.object({
  contentBlockDelta: z.object({
    delta: z.object({ text: z.string() }),
  }),
});

/**
 * Error raised for an exception event found inside a stream
 */
export class StreamEventError extends Error {
  readonly event: unknown;

  constructor(name: string, message: string, event: unknown) {
    super(message);
    this.name = name;
    this.event = event;
  }
}

/**
 * Exception member of a stream event (`{ throttlingException: {...} }`),
 * turned into an error named after it
 */
export function streamEventException(
  event: unknown,
): StreamEventError | undefined {
  if (typeof event !== "object" || event === null) return undefined;
  for (const [key, value] of Object.entries(event)) {
    if (!key.endsWith("Exception")) continue;
    const message =
      typeof value === "object" &&
      value !== null &&
      "message" in value &&
      typeof value.message === "string"
        ? value.message
        : key;
    const name = key.charAt(0).toUpperCase() + key.slice(1);
    return new StreamEventError(name, message, event);
  }
  return undefined;
}

function firstTextBlock(content: readonly unknown[]): string | undefined {
  for (const block of content) {
    const parsed = TextBlockSchema.safeParse(block);
    if (parsed.success) return parsed.data.text;
  }
  return undefined;
}

function readEventStream(response: unknown): AsyncIterable<unknown> {
  if (
    typeof response === "object" &&
    response !== null &&
    "stream" in response &&
    isAsyncIterable(response.stream)
  ) {
    return response.stream;
  }
  throw missingStreamError("stream");
}

export const messagesShape: CallShapeHandler<MessagesInputBase> = {
  shape: CallShapes.MESSAGES,

  hasPayload(input: MessagesInputBase): boolean {
    return Array.isArray(input.messages) && input.messages.length > 0;
  },

  extractContent(response: unknown): string | undefined {
    const parsed = MessagesResponseSchema.safeParse(response);
    if (!parsed.success) return undefined;
    return firstTextBlock(parsed.data.output.message.content);
  },

  readStream(
    response: unknown,
    options: ReadStreamOptions = {},
  ): AsyncGenerator<StreamChunk> {
    const { contentOnly = true } = options;
    const source = readEventStream(response);

    return toStreamChunks(source, (event): StreamChunk | null => {
      const exception = streamEventException(event);
      if (exception) throw exception;

      const delta = ContentDeltaEventSchema.safeParse(event);
      if (delta.success) {
        return { type: "text", value: delta.data.contentBlockDelta.delta.text };
      }
      return contentOnly ? null : { type: "event", value: event };
    });
  },
};
