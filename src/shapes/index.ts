// Call shape registry and request dispatch

import type {
  CallShape,
  FailoverRequest,
  FailoverTransport,
  InvocationTarget,
  MessagesInputBase,
  RawBodyInputBase,
} from "../types/transport";
import { CallShapes } from "../types/transport";
import type { CallShapeHandler } from "./types";
import { messagesShape } from "./messages";
import { rawBodyShape } from "./raw-body";

export type { CallShapeHandler } from "./types";
export { messagesShape, streamEventException, StreamEventError } from "./messages";
export { rawBodyShape, decodeJsonBody, extractBodyText } from "./raw-body";
export { collectStream, isAsyncIterable, toStreamChunks } from "./stream";

type AnyShapeHandler =
  | CallShapeHandler<MessagesInputBase>
  | CallShapeHandler<RawBodyInputBase>;

export function getCallShapeHandler(
  shape: typeof CallShapes.MESSAGES,
): CallShapeHandler<MessagesInputBase>;
export function getCallShapeHandler(
  shape: typeof CallShapes.RAW_BODY,
): CallShapeHandler<RawBodyInputBase>;
export function getCallShapeHandler(shape: CallShape): AnyShapeHandler;
export function getCallShapeHandler(shape: CallShape): AnyShapeHandler {
  switch (shape) {
    case CallShapes.MESSAGES:
      return messagesShape;
    case CallShapes.RAW_BODY:
      return rawBodyShape;
  }
}

/**
 * Whether the request carries its shape's required payload
 */
export function hasRequestPayload<
  TMessages extends MessagesInputBase,
  TRawBody extends RawBodyInputBase,
>(request: FailoverRequest<TMessages, TRawBody>): boolean {
  switch (request.shape) {
    case CallShapes.MESSAGES:
      return messagesShape.hasPayload(request.input);
    case CallShapes.RAW_BODY:
      return rawBodyShape.hasPayload(request.input);
  }
}

/**
 * Send one invocation of `request` to `target` through the transport
 * operation matching its shape
 */
export function dispatchRequest<
  TMessages extends MessagesInputBase,
  TRawBody extends RawBodyInputBase,
>(
  transport: FailoverTransport<TMessages, TRawBody>,
  target: InvocationTarget,
  request: FailoverRequest<TMessages, TRawBody>,
): Promise<unknown> {
  const stream = request.stream ?? false;
  switch (request.shape) {
    case CallShapes.MESSAGES:
      return transport.converse(target, request.input, { stream });
    case CallShapes.RAW_BODY:
      return transport.invokeModel(target, request.input, { stream });
  }
}
