// Call shape handler interface

import type {
  CallShape,
  ReadStreamOptions,
  StreamChunk,
} from "../types/transport";

/**
 * Per-shape handling of request payloads and responses.
 *
 * One implementation per `CallShape`; picked with `getCallShapeHandler()`,
 * never by matching on API names.
 */
export interface CallShapeHandler<TInput> {
  readonly shape: CallShape;

  /**
   * Whether the required payload (messages or body) is present
   */
  hasPayload(input: TInput): boolean;

  /**
   * First text block of a non-streamed response
   */
  extractContent(response: unknown): string | undefined;

  /**
   * Lazily read a streamed response. Each call starts a new reader over
   * the response's stream.
   */
  readStream(
    response: unknown,
    options?: ReadStreamOptions,
  ): AsyncGenerator<StreamChunk>;
}
