import type {
  ConnectionId,
  ErrorContext,
  IdGenerator,
  JSONRPCErrorResponse,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResultResponse,
  LogContext,
  Logger,
  MessageContext,
  MessageInfo,
  RequestId,
  Result
} from "./types";
import {
  ConnectionClosedError,
  ConnectionError,
  DecodeError,
  HandlerError,
  InternalError,
  JSONRPC_VERSION,
  ProtocolError,
  TransportError,
  toError
} from "./types";

import type { Transport } from "./transport";
import type { Connection } from "./connection";
import { Session } from "./session";
import { Semaphore } from "./concurrency";
import { extractCorrelationKey } from "./envelope";
import { type JsonSchema, type SchemaValidator, StandardSchemaValidator } from "./schema-validator";
import { NoopLogger } from "./logger";
import { DefaultIdGenerator } from "./id";
import { isCancelledNotification, isJSONRPCNotification, isJSONRPCRequest } from "./assertions";
import { DEFAULT_MAX_CONCURRENCY } from "./constants";

// =============================================================================
// Internal Types
// =============================================================================

type ConnectionState = {
  readonly id: ConnectionId;
  readonly session: Session;
  readonly transport: Transport;
  /** Aborted by close(), the external connect signal, or a transport fault */
  readonly controller: AbortController;
  readonly inFlight: Set<Promise<void>>;
  /** Correlation key -> controller of the request being handled */
  readonly requests: Map<string, AbortController>;
  /** Requests the peer cancelled; their responses are suppressed */
  readonly cancelled: WeakSet<AbortController>;
};

// =============================================================================
// Protocol Options
// =============================================================================

/**
 * Configuration options for the Protocol.
 */
export type ProtocolOptions = {
  /**
   * Logger for protocol-level logging.
   * If not provided, NoopLogger will be used.
   */
  readonly logger?: Logger;

  /**
   * ID generator for connection and session identifiers.
   * If not provided, DefaultIdGenerator (UUID-based) will be used.
   */
  readonly id?: IdGenerator;

  /**
   * Validator applied to incoming params.
   * If not provided, StandardSchemaValidator will be used.
   */
  readonly schemaValidator?: SchemaValidator;

  /**
   * Maximum number of message handlers running at once. Messages beyond the
   * bound are still received and queue for a slot.
   * @default Infinity
   */
  readonly maxConcurrency?: number;
};

export type ConnectOptions = {
  /**
   * Ends the receive loop when aborted. The abort is forwarded to the signal
   * of every handler still running.
   */
  readonly signal?: AbortSignal;
};

// =============================================================================
// Protocol Class
// =============================================================================

/**
 * Abstract base class for the receiving side of a JSON-RPC 2.0 session.
 *
 * Pulls messages from one transport in a sequential loop and hands each one to
 * an independent task, so a slow handler never delays the receipt of the next
 * message. Responses carry the id of their request; completion order is not
 * tied to arrival order.
 */
export abstract class Protocol<TOutgoingNotification extends JSONRPCNotification = JSONRPCNotification> {
  protected readonly logger: Logger;
  protected readonly id: IdGenerator;
  protected readonly schemaValidator: SchemaValidator;
  private readonly limiter: Semaphore;
  private current?: { readonly state: ConnectionState; readonly connection: Connection };

  constructor(public readonly options?: ProtocolOptions) {
    this.logger = options?.logger ?? new NoopLogger();
    this.id = options?.id ?? new DefaultIdGenerator();
    this.schemaValidator = options?.schemaValidator ?? new StandardSchemaValidator();
    this.limiter = new Semaphore(options?.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  }

  /**
   * The attached connection, if any.
   */
  get connection(): Connection | undefined {
    return this.current?.connection;
  }

  /**
   * Answers a request. The returned value becomes the response's `result`;
   * a thrown ProtocolError becomes its `error`.
   */
  protected abstract handleRequest(request: JSONRPCRequest, context: MessageContext, info: MessageInfo): Promise<Result>;

  /**
   * Consumes a notification. Nothing is ever sent back.
   */
  protected abstract handleNotification(notification: JSONRPCNotification, context: MessageContext, info: MessageInfo): Promise<void>;

  /**
   * Attaches a transport, creates its session and starts the receive loop.
   */
  public async connect(transport: Transport, options?: ConnectOptions): Promise<Connection> {
    if (this.current) {
      throw new ConnectionError("A transport is already attached");
    }

    const controller = new AbortController();
    const external = options?.signal;
    if (external?.aborted) {
      controller.abort(external.reason);
    } else {
      external?.addEventListener("abort", () => controller.abort(external.reason), { once: true });
    }

    await transport.connect();

    const state: ConnectionState = {
      id: this.id.generate({ prefix: "connection" }),
      session: new Session(this.id.generate({ prefix: "session" })),
      transport,
      controller,
      inFlight: new Set(),
      requests: new Map(),
      cancelled: new WeakSet()
    };

    const closed = this.receiveLoop(state);
    const connection: Connection = {
      id: state.id,
      session: state.session,
      transport,
      closed,
      close: async () => {
        controller.abort(new ConnectionClosedError());
        await closed;
      }
    };
    this.current = { state, connection };

    return connection;
  }

  /**
   * Closes the attached connection, if any.
   */
  public async close(): Promise<void> {
    this.logger.info("Closing protocol");
    await this.current?.connection.close();
  }

  /**
   * Sends a notification on the attached transport.
   *
   * @throws ConnectionError when no transport is attached.
   */
  public async notify(notification: TOutgoingNotification): Promise<void> {
    const current = this.current;
    if (!current) {
      throw new ConnectionError("No transport attached");
    }

    try {
      await current.state.transport.send(notification, { sessionId: current.state.session.id });
    } catch (error) {
      if (error instanceof TransportError) {
        this.terminate(current.state, error);
      }
      throw error;
    }
  }

  /**
   * Validates incoming params with the configured validator.
   */
  protected validate<T>(params: unknown, schema: JsonSchema<unknown, T>): Promise<T> {
    return this.schemaValidator.validate(params, schema);
  }

  // ---------------------------------------------------------------------------
  // Receive loop
  // ---------------------------------------------------------------------------

  private async receiveLoop(state: ConnectionState): Promise<void> {
    const logContext: LogContext = { connectionId: state.id, sessionId: state.session.id };
    this.logger.info("Session started", logContext);

    try {
      for (;;) {
        const next = await state.transport.receive(state.controller.signal);

        if (next.type === "closed") {
          break;
        }

        if (next.type === "invalid") {
          const error = next.error;
          this.spawn(state, () => this.rejectUndecodable(state, error));
          continue;
        }

        const message = next.message;
        const timestamp = next.info.timestamp;
        this.spawn(state, () => this.dispatch(state, message, timestamp));
      }
    } catch (error) {
      this.logger.error("Transport failed; ending session", toError(error), { ...logContext, recoverable: false });
    } finally {
      await Promise.allSettled(Array.from(state.inFlight));
      state.session.close();

      try {
        await state.transport.disconnect();
      } catch (error) {
        this.logger.error("Failed to disconnect transport", toError(error), logContext);
      }

      if (this.current?.state === state) {
        this.current = undefined;
      }
      this.logger.info("Session closed", logContext);
    }
  }

  private spawn(state: ConnectionState, work: () => Promise<void>): void {
    const task = this.limiter.run(work).catch((error: unknown) => {
      this.handleUnexpectedError(toError(error), { connectionId: state.id, sessionId: state.session.id });
    });
    state.inFlight.add(task);
    void task.then(() => state.inFlight.delete(task));
  }

  private async dispatch(state: ConnectionState, message: JSONRPCMessage, timestamp: Date): Promise<void> {
    if (isJSONRPCRequest(message)) {
      await this.processRequest(state, message, timestamp);
    } else if (isJSONRPCNotification(message)) {
      await this.processNotification(state, message, timestamp);
    } else {
      this.logger.debug("Ignoring response; this endpoint sends no requests", {
        connectionId: state.id,
        requestId: message.id === null ? undefined : String(message.id)
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  private async processRequest(state: ConnectionState, request: JSONRPCRequest, timestamp: Date): Promise<void> {
    const key = extractCorrelationKey(request);
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(state.controller.signal.reason);

    if (state.controller.signal.aborted) {
      controller.abort(state.controller.signal.reason);
    } else {
      state.controller.signal.addEventListener("abort", forwardAbort, { once: true });
    }
    state.requests.set(key, controller);

    const info: MessageInfo = {
      method: request.method,
      requestId: request.id,
      sessionId: state.session.id,
      timestamp,
      signal: controller.signal
    };
    const logContext: LogContext = {
      connectionId: state.id,
      sessionId: state.session.id,
      method: request.method,
      requestId: String(request.id)
    };
    const started = Date.now();

    let response: JSONRPCResultResponse | JSONRPCErrorResponse;
    try {
      this.logger.debug("Handling request", logContext);
      const result = await this.handleRequest(request, this.createContext(state), info);
      response = { jsonrpc: JSONRPC_VERSION, id: request.id, result };
    } catch (error) {
      const protocolError = this.toProtocolError(error, request.method, logContext);
      response = { jsonrpc: JSONRPC_VERSION, id: request.id, error: protocolError.toJSON() };
    } finally {
      state.controller.signal.removeEventListener("abort", forwardAbort);
      if (state.requests.get(key) === controller) {
        state.requests.delete(key);
      }
    }

    if (state.cancelled.has(controller)) {
      this.logger.debug("Request cancelled by peer; response suppressed", logContext);
      return;
    }

    this.logger.debug("Request handled", { ...logContext, durationMs: Date.now() - started });

    try {
      await this.deliver(state, response, request.id);
    } catch (error) {
      // only a result can fail to serialize; answer with the failure instead
      const protocolError = this.toProtocolError(error, request.method, logContext);
      await this.deliver(state, { jsonrpc: JSONRPC_VERSION, id: request.id, error: protocolError.toJSON() }, request.id);
    }
  }

  private toProtocolError(error: unknown, method: string, logContext: LogContext): ProtocolError {
    if (error instanceof ProtocolError) {
      this.logger.debug("Request answered with error", { ...logContext, errorCode: error.code, message: error.message });
      return error;
    }

    const cause = toError(error);
    this.handleHandlerError(new HandlerError(cause.message, method, cause), { ...logContext });
    return new InternalError(cause.message);
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  private async processNotification(state: ConnectionState, notification: JSONRPCNotification, timestamp: Date): Promise<void> {
    if (isCancelledNotification(notification)) {
      this.cancelRequest(state, notification.params.requestId, notification.params.reason);
      return;
    }

    const info: MessageInfo = {
      method: notification.method,
      sessionId: state.session.id,
      timestamp,
      signal: state.controller.signal
    };

    try {
      await this.handleNotification(notification, this.createContext(state), info);
    } catch (error) {
      const cause = toError(error);
      this.handleHandlerError(new HandlerError(cause.message, notification.method, cause), {
        connectionId: state.id,
        sessionId: state.session.id,
        method: notification.method
      });
    }
  }

  private cancelRequest(state: ConnectionState, requestId: RequestId, reason?: string): void {
    const controller = state.requests.get(extractCorrelationKey(requestId));
    if (!controller) {
      this.logger.debug("Cancellation for unknown request ignored", { connectionId: state.id, requestId: String(requestId) });
      return;
    }

    state.cancelled.add(controller);
    state.requests.delete(extractCorrelationKey(requestId));
    controller.abort(reason ?? "Cancelled by peer");
  }

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  private async rejectUndecodable(state: ConnectionState, error: DecodeError): Promise<void> {
    const logContext: LogContext = { connectionId: state.id, sessionId: state.session.id, reason: error.reason };

    if (error.id === undefined) {
      this.logger.warn("Dropping undecodable record without id", logContext);
      return;
    }

    this.logger.warn("Answering undecodable record with parse error", { ...logContext, requestId: String(error.id) });
    await this.deliver(state, { jsonrpc: JSONRPC_VERSION, id: error.id, error: error.toJSON() }, error.id);
  }

  /**
   * Writes a response. A transport fault ends the session instead of propagating.
   */
  private async deliver(state: ConnectionState, message: JSONRPCMessage, requestId: RequestId): Promise<void> {
    try {
      await state.transport.send(message, { sessionId: state.session.id, requestId });
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.terminate(state, error);
    }
  }

  private terminate(state: ConnectionState, error: TransportError): void {
    if (state.controller.signal.aborted) {
      return;
    }
    this.logger.error("Transport failed while sending; ending session", error, {
      connectionId: state.id,
      sessionId: state.session.id,
      recoverable: false
    });
    state.controller.abort(error);
  }

  private createContext(state: ConnectionState): MessageContext {
    return {
      session: state.session,
      logger: this.logger,
      id: this.id
    };
  }

  protected handleHandlerError(error: Error, context: ErrorContext): void {
    this.logger.error("Handler error", error, context);
  }

  protected handleUnexpectedError(error: Error, context: ErrorContext): void {
    this.logger.error("Unexpected error", error, context);
  }
}
