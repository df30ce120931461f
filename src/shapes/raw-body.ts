// Raw body call shape: opaque request body invocations

import { z } from "zod";
import type {
  RawBodyInputBase,
  ReadStreamOptions,
  StreamChunk,
} from "../types/transport";
import { CallShapes } from "../types/transport";
import type { CallShapeHandler } from "./types";
import { streamEventException } from "./messages";
import { isAsyncIterable, missingStreamError, toStreamChunks } from "./stream";

const decoder = new TextDecoder();

const TextBlockSchema = z.object({ text: z.string() });

// Output layouts of the common model families, tried in order
const BodyTextSchemas = [
  z
    .object({ content: z.array(z.unknown()) })
    .transform(({ content }) => firstTextBlock(content)),
  z.object({ completion: z.string() }).transform((body) => body.completion),
  z.object({ generation: z.string() }).transform((body) => body.generation),
  z
    .object({ results: z.array(z.object({ outputText: z.string() })).min(1) })
    .transform((body) => body.results[0]?.outputText),
  z.object({ outputText: z.string() }).transform((body) => body.outputText),
];

const ChunkDeltaSchemas = [
  z
    .object({ delta: z.object({ text: z.string() }) })
    .transform((chunk) => chunk.delta.text),
  z.object({ completion: z.string() }).transform((chunk) => chunk.completion),
  z.object({ generation: z.string() }).transform((chunk) => chunk.generation),
  z.object({ outputText: z.string() }).transform((chunk) => chunk.outputText),
];

const PayloadEventSchema = z.object({
  chunk: z.object({ bytes: z.instanceof(Uint8Array) }),
});

function firstTextBlock(content: readonly unknown[]): string | undefined {
  for (const block of content) {
    const parsed = TextBlockSchema.safeParse(block);
    if (parsed.success) return parsed.data.text;
  }
  return undefined;
}

function firstMatch(
  schemas: ReadonlyArray<z.ZodType<string | undefined, z.ZodTypeDef, unknown>>,
  value: unknown,
): string | undefined {
  for (const schema of schemas) {
    const parsed = schema.safeParse(value);
    if (parsed.success && parsed.data !== undefined) return parsed.data;
  }
  return undefined;
}

/**
 * Decode a body (string or bytes) as JSON. Returns undefined when it is not
 * JSON.
 */
export function decodeJsonBody(body: unknown): unknown {
  let text: string;
  if (typeof body === "string") {
    text = body;
  } else if (body instanceof Uint8Array) {
    text = decoder.decode(body);
  } else {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Text of a decoded response body
 */
export function extractBodyText(body: unknown): string | undefined {
  return firstMatch(BodyTextSchemas, body);
}

function readBodyStream(response: unknown): AsyncIterable<unknown> {
  if (
    typeof response === "object" &&
    response !== null &&
    "body" in response &&
    isAsyncIterable(response.body)
  ) {
    return response.body;
  }
  throw missingStreamError("body");
}

export const rawBodyShape: CallShapeHandler<RawBodyInputBase> = {
  shape: CallShapes.RAW_BODY,

  hasPayload(input: RawBodyInputBase): boolean {
    const { body } = input;
    if (typeof body === "string") return body.length > 0;
    if (body instanceof Uint8Array) return body.byteLength > 0;
    return false;
  },

  extractContent(response: unknown): string | undefined {
    if (typeof response !== "object" || response === null) return undefined;
    if (!("body" in response)) return undefined;
    return extractBodyText(decodeJsonBody(response.body));
  },

  readStream(
    response: unknown,
    options: ReadStreamOptions = {},
  ): AsyncGenerator<StreamChunk> {
    const { contentOnly = true } = options;
    const source = readBodyStream(response);

    return toStreamChunks(source, (event): StreamChunk | null => {
      const exception = streamEventException(event);
      if (exception) throw exception;

      const payload = PayloadEventSchema.safeParse(event);
      if (!payload.success) {
        return contentOnly ? null : { type: "event", value: event };
      }

      const decoded = decodeJsonBody(payload.data.chunk.bytes);
      const text = firstMatch(ChunkDeltaSchemas, decoded);
      if (text !== undefined) return { type: "text", value: text };
      return contentOnly ? null : { type: "event", value: decoded };
    });
  },
};
