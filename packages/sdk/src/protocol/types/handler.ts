import type { IdGenerator } from "./id";
import type { Logger } from "./logger";
import type { RequestId, Result, SessionId } from "./schema";
import type { Session } from "../session";

/**
 * Per-message facts handed to every handler.
 */
export type MessageInfo = {
  readonly method: string;
  /** Correlation id of the request; absent for notifications */
  readonly requestId?: RequestId;
  readonly sessionId: SessionId;
  /** When the transport received the message */
  readonly timestamp: Date;
  /**
   * Aborted when the peer cancels the request or the connection is closed.
   * Handlers decide whether and how to stop; the dispatcher never interrupts them.
   */
  readonly signal: AbortSignal;
};

/**
 * Collaborators available to every handler.
 */
export type MessageContext = {
  readonly session: Session;
  readonly logger: Logger;
  readonly id: IdGenerator;
};

/**
 * Handles validated request params and returns the result payload.
 * The protocol wraps the result in a response carrying the request's id.
 */
export type RequestHandler<TParams, TResult extends Result> = (params: TParams, context: MessageContext, info: MessageInfo) => Promise<TResult>;

/**
 * Handles validated notification params. Nothing is ever sent back.
 */
export type NotificationHandler<TParams> = (params: TParams, context: MessageContext, info: MessageInfo) => Promise<void>;
