/**
 * Lifecycle Management
 *
 * Handles the `initialize` request and the `initialized` notification.
 */

import { SUPPORTED_PROTOCOL_VERSIONS } from "../protocol/constants";
import type { InitializeRequestParams, InitializeResult, MessageContext } from "../protocol/types";
import { LATEST_PROTOCOL_VERSION } from "../protocol/types";
import type { Server } from "./server";

/**
 * Check if a protocol version is supported.
 */
export function isProtocolVersionSupported(version: string): boolean {
  return SUPPORTED_PROTOCOL_VERSIONS.includes(version);
}

/**
 * Picks the version to advertise. The client's version is echoed when
 * supported; otherwise, or when the client named none, the latest supported
 * version is returned.
 */
export function negotiateProtocolVersion(clientVersion: string | undefined): string {
  if (clientVersion !== undefined && isProtocolVersionSupported(clientVersion)) {
    return clientVersion;
  }
  return LATEST_PROTOCOL_VERSION;
}

/**
 * Handle the initialize request.
 *
 * Every initialize request is answered with the same result. Only the first
 * one moves the session to initialized and runs `onInitialize`. The client's
 * identity and version are recorded but never required.
 */
export async function handleInitialize(server: Server, params: InitializeRequestParams, context: MessageContext): Promise<InitializeResult> {
  const session = context.session;
  const protocolVersion = negotiateProtocolVersion(params.protocolVersion);

  if (params.protocolVersion !== undefined && protocolVersion !== params.protocolVersion) {
    context.logger.warn("Client requested an unsupported protocol version", {
      sessionId: session.id,
      requested: params.protocolVersion,
      advertised: protocolVersion
    });
  }

  const clientCapabilities = params.capabilities ?? {};
  const transitioned = session.markInitialized({
    protocolVersion,
    clientInfo: params.clientInfo,
    clientCapabilities
  });

  if (transitioned) {
    context.logger.info("Session initialized", {
      sessionId: session.id,
      client: params.clientInfo?.name,
      clientVersion: params.clientInfo?.version
    });

    await server.serverOptions.onInitialize?.(
      {
        protocolVersion,
        requestedProtocolVersion: params.protocolVersion,
        clientInfo: params.clientInfo,
        clientCapabilities
      },
      session
    );
  } else {
    context.logger.debug("Repeated initialize answered without a state change", { sessionId: session.id });
  }

  const result: InitializeResult = {
    protocolVersion,
    capabilities: server.capabilities,
    serverInfo: server.serverInfo
  };

  if (server.instructions) {
    result.instructions = server.instructions;
  }

  return result;
}

/**
 * Handle the initialized notification. Accepted in any state.
 */
export async function handleInitialized(server: Server, context: MessageContext): Promise<void> {
  context.logger.debug("Client reported initialized", { sessionId: context.session.id });
  await server.serverOptions.onInitialized?.(context.session);
}
